/* packages/core/test/registry.spec.ts */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, it, expect } from 'vitest';
import { ConfigError, NodeRegistry, NodeType, UnknownNameError, buildRegistry, loadNetworks } from '../src';
import { NETWORKS_PATH, memoryStore, sortedIds } from '../../../tests/helpers';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'netlace-registry-'));

function writeNetworks(name: string, body: unknown): string {
  const file = path.join(tmp, name);
  fs.writeFileSync(file, JSON.stringify(body));
  return file;
}

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('loadNetworks', () => {
  it('builds node types from networks.json and its catalog', () => {
    const registry = loadNetworks(NETWORKS_PATH);

    expect(registry.list().map((t) => t.entity)).toEqual(['person', 'channel']);
    expect(registry.get('person').has('associates')).toBe(true);
    expect(registry.get('person').has('invites_in')).toBe(true);
    expect(registry.get('channel').describe().map((a) => a.name)).toEqual([
      'shows', 'premium_shows', 'mega_shows', 'pay_shows'
    ]);
  });

  it('resolves declared accessors against a store', async () => {
    const person = loadNetworks(NETWORKS_PATH).get('person');
    const contacts = person.bind(memoryStore(), 1).related('contacts');
    expect(sortedIds(await contacts.toArray())).toEqual([3, 4]);
  });

  it('fails on a missing file', () => {
    expect(() => loadNetworks(path.join(tmp, 'absent.json'))).toThrow(ConfigError);
  });

  it('rejects an unknown version', () => {
    const file = writeNetworks('old.json', { version: 'networks/0.0', nodes: [] });
    expect(() => loadNetworks(file)).toThrow(ConfigError);
  });

  it('surfaces declaration errors at load time', () => {
    const file = writeNetworks('bad-union.json', {
      version: 'networks/0.1',
      nodes: [{ entity: 'person', table: 'people', unions: [{ name: 'associates', sources: ['friends'] }] }]
    });
    expect(() => loadNetworks(file)).toThrow('union "associates" lists undeclared accessor(s) friends');
  });

  it('checks columns when a catalog is named', () => {
    fs.writeFileSync(path.join(tmp, 'catalog.json'), JSON.stringify({
      version: 'catalog/0.1',
      entities: [{ name: 'invites', primaryKey: 'id', fields: [{ name: 'id', type: 'number' }] }]
    }));
    const file = writeNetworks('with-catalog.json', {
      version: 'networks/0.1',
      catalog: 'catalog.json',
      nodes: [{ entity: 'person', table: 'people', networks: [{ name: 'contacts', through: 'invites' }] }]
    });
    expect(() => loadNetworks(file))
      .toThrow('network "contacts" through "invites": entity "invites" has no column(s) person_id, person_id_target');
  });
});

describe('NodeRegistry', () => {
  it('rejects duplicate entities and unknown lookups', () => {
    const registry = new NodeRegistry().register(new NodeType<string>({ entity: 'person' }));
    expect(() => registry.register(new NodeType<string>({ entity: 'person' }))).toThrow(ConfigError);
    expect(() => registry.get('planet')).toThrow(UnknownNameError);
  });

  it('keeps declaration order from the parsed file', () => {
    const registry = buildRegistry({
      version: 'networks/0.1',
      nodes: [{ entity: 'person', table: 'people', hasMany: [], unions: [], networks: [{ name: 'friends' }] }]
    });
    expect(registry.get('person').describe().map((a) => a.name)).toEqual(['friends_out', 'friends_in', 'friends']);
  });
});
