/* apps/http/test/app.spec.ts */
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ArrayCollection, MemoryStore, loadNetworks, type Collection } from '@netlace/core';
import { buildApp, classifyError, parseId } from '../src/app';
import { NETWORKS_PATH, loadSeed, sqliteStore } from '../../../tests/helpers';

// edge traversals fail the way a dropped database connection does
class UnreachableStore extends MemoryStore {
  through(): Collection {
    return new ArrayCollection(() => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:3306');
    });
  }
}

describe('http app', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    const store = sqliteStore();
    app = await buildApp({ registry: loadNetworks(NETWORKS_PATH), store, logLevel: false });
    app.addHook('onClose', async () => store.close());
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /healthz', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(res.headers['x-request-id']).toBeTruthy();
  });

  it('GET /readyz reports the store', async () => {
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, store: { name: 'sql', ok: true } });
  });

  it('GET /nodes lists node types and accessors', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes' });
    const body = res.json();
    expect(body.nodes.map((n: { entity: string }) => n.entity)).toEqual(['person', 'channel']);
    expect(body.nodes[1]).toEqual({
      entity: 'channel',
      table: 'channels',
      accessors: [
        { name: 'shows', kind: 'hasMany' },
        { name: 'premium_shows', kind: 'hasMany' },
        { name: 'mega_shows', kind: 'hasMany' },
        { name: 'pay_shows', kind: 'union' }
      ]
    });
  });

  it('GET an accessor returns the deduplicated rows', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      rows: [{ id: 3, name: 'Carol' }, { id: 4, name: 'Dave' }],
      count: 2
    });
  });

  it('GET find with one id returns the bare row', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts/find?ids=3' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ row: { id: 3, name: 'Carol' } });
  });

  it('GET find with a missing id is a 404 naming every requested id', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts/find?ids=3,5' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({
      code: 'NET_NOT_FOUND',
      error: "Couldn't find all records with ids (3,5)",
      details: { ids: [3, 5] }
    });
  });

  it.each([
    ['/nodes/person/1/enemies', 'Unknown accessor: enemies'],
    ['/nodes/planet/1/moons', 'Unknown entity: planet']
  ])('GET %s is a 404', async (url, error) => {
    const res = await app.inject({ method: 'GET', url });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ code: 'NET_UNKNOWN', error });
  });

  it('GET find without ids is a validation error', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts/find' });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('VALIDATION');
  });

  it('POST links through a join-table accessor', async () => {
    const res = await app.inject({ method: 'POST', url: '/nodes/person/3/friends_in', payload: { targetId: 4 } });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ ok: true });

    const friends = await app.inject({ method: 'GET', url: '/nodes/person/3/friends' });
    expect(friends.json()).toEqual({ rows: [{ id: 4, name: 'Dave' }], count: 1 });
  });

  it('POST to a union accessor is rejected', async () => {
    const res = await app.inject({ method: 'POST', url: '/nodes/person/1/associates', payload: { targetId: 2 } });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('NET_UNSUPPORTED');
  });

  it('POST with a bad body is a validation error', async () => {
    const res = await app.inject({ method: 'POST', url: '/nodes/person/1/friends_out', payload: { target: 2 } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION', message: 'Request failed' });
  });
});

describe('http app over an unreachable store', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildApp({ registry: loadNetworks(NETWORKS_PATH), store: new UnreachableStore(loadSeed()), logLevel: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('maps a driver failure to 502', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts' });
    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({ code: 'ADAPTER', error: 'connect ECONNREFUSED 127.0.0.1:3306' });
  });

  it('does not report a failed lookup as missing ids', async () => {
    const res = await app.inject({ method: 'GET', url: '/nodes/person/1/contacts/find?ids=3' });
    expect(res.statusCode).toBe(502);
    expect(res.json().code).toBe('ADAPTER');
  });
});

describe('classifyError', () => {
  it('keeps unrecognised failures internal', () => {
    expect(classifyError(new Error('boom'))).toEqual({ code: 'NET_INTERNAL', status: 500, message: 'boom' });
  });
});

describe('parseId', () => {
  it.each<[string, string | number]>([
    ['42', 42],
    ['0', 0],
    ['007', '007'],
    ['9007199254740993', '9007199254740993'],
    ['abc-1', 'abc-1']
  ])('%s', (raw, expected) => {
    expect(parseId(raw)).toBe(expected);
  });
});
