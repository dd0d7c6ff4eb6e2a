// packages/core/src/registry.ts
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, UnknownNameError } from './errors';
import { createLogger } from './logger';
import { NodeType } from './node';
import { CatalogSchema, NetworksFileSchema, type NetworksFile } from './schemas';
import type { Catalog } from './types';

const log = createLogger('netlace:registry');

export class NodeRegistry {
  private readonly types = new Map<string, NodeType<string>>();

  register(type: NodeType<string>): this {
    if (this.types.has(type.entity)) throw new ConfigError(`node type "${type.entity}" is already registered`);
    this.types.set(type.entity, type);
    return this;
  }

  get(entity: string): NodeType<string> {
    const t = this.types.get(entity);
    if (!t) throw new UnknownNameError('entity', entity);
    return t;
  }

  list(): NodeType<string>[] {
    return [...this.types.values()];
  }
}

export function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function loadCatalog(file: string): Catalog {
  const parsed = CatalogSchema.safeParse(readJson(file));
  if (!parsed.success) throw ConfigError.fromZod(`catalog ${file}`, parsed.error);
  return parsed.data;
}

/** Builds node types from a parsed networks file. Declaration order is kept. */
export function buildRegistry(spec: NetworksFile, catalog?: Catalog): NodeRegistry {
  const registry = new NodeRegistry();
  for (const node of spec.nodes) {
    let type = new NodeType<string>({
      entity: node.entity,
      table: node.table,
      primaryKey: node.primaryKey,
      catalog
    });
    for (const { name, ...options } of node.hasMany) type = type.declareHasMany(name, options);
    for (const { name, ...options } of node.networks) type = type.declareNetwork(name, options);
    for (const u of node.unions) type = type.declareUnion(u.name, u.sources);
    registry.register(type);
  }
  return registry;
}

/**
 * Loads networks.json (searched upwards from the working directory unless a
 * path is given) and the catalog it points at, if any.
 */
export function loadNetworks(file?: string): NodeRegistry {
  const p = file ?? findUp('networks.json');
  if (!p) throw new ConfigError('networks.json not found. Provide NETWORKS_PATH or a networks.json file.');
  log.info({ path: p }, 'loading networks');

  const parsed = NetworksFileSchema.safeParse(readJson(p));
  if (!parsed.success) throw ConfigError.fromZod(`networks ${p}`, parsed.error);

  const catalog = parsed.data.catalog
    ? loadCatalog(path.resolve(path.dirname(p), parsed.data.catalog))
    : undefined;
  const registry = buildRegistry(parsed.data, catalog);
  log.info({ entities: registry.list().map((t) => t.entity) }, 'networks loaded');
  return registry;
}
