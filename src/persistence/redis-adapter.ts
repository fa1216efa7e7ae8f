import { Redis } from "ioredis";
import type { HubRow, QueryRow } from "../contracts.js";
import { QueryError } from "../errors.js";
import {
  assertApplyInput,
  isValidSourceId,
  type HubApplyInput,
  type HubStore,
  type HubTableRef,
} from "./hub-store.js";
import { isValidIdentifier, isRecordPayload } from "./sqlite.js";

type StoredRow = Omit<HubRow, "id">;

function parseStoredRow(id: string, raw: string): HubRow | undefined {
  const value: unknown = JSON.parse(raw);
  if (typeof value !== "object" || value === null) return undefined;
  const payload: unknown = "payload" in value ? value.payload : undefined;
  const createdAt: unknown = "createdAt" in value ? value.createdAt : undefined;
  const updatedAt: unknown = "updatedAt" in value ? value.updatedAt : undefined;
  if (!isRecordPayload(payload) || typeof createdAt !== "number" || typeof updatedAt !== "number") {
    return undefined;
  }
  return { id, payload, createdAt, updatedAt };
}

/**
 * Hub backend on Redis: a set of sources, a set of tables per source and one
 * hash per (source, table) mapping id to the stored row.
 */
export class RedisHubStore implements HubStore {
  private readonly redis: Redis;
  private readonly ownsConnection: boolean;
  private readonly now: () => number;

  constructor(redisOrUrl: Redis | string, options: { now?: () => number } = {}) {
    this.ownsConnection = typeof redisOrUrl === "string";
    this.redis = typeof redisOrUrl === "string" ? new Redis(redisOrUrl) : redisOrUrl;
    this.now = options.now ?? Date.now;
  }

  async ensureTable(sourceId: string, table: string): Promise<void> {
    if (!isValidSourceId(sourceId)) throw new Error(`invalid source id "${sourceId}"`);
    if (!isValidIdentifier(table)) throw new Error(`invalid table name "${table}"`);
    // SADD is idempotent, so racing first writes converge on the same sets
    await this.redis.sadd("hub:sources", sourceId);
    await this.redis.sadd(`hub:tables:${sourceId}`, table);
  }

  async apply(input: HubApplyInput): Promise<void> {
    const id = assertApplyInput(input);
    await this.ensureTable(input.sourceId, input.table);
    const key = this.rowsKey(input.sourceId, input.table);

    if (input.operation === "delete") {
      await this.redis.hdel(key, id);
      return;
    }

    const now = this.now();
    const existingRaw = await this.redis.hget(key, id);
    const existing = existingRaw ? parseStoredRow(id, existingRaw) : undefined;
    const row: StoredRow = {
      payload: input.payload,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.redis.hset(key, id, JSON.stringify(row));
  }

  async get(sourceId: string, table: string, id: string): Promise<HubRow | undefined> {
    const raw = await this.redis.hget(this.rowsKey(sourceId, table), id);
    return raw ? parseStoredRow(id, raw) : undefined;
  }

  async list(sourceId: string, table: string): Promise<HubRow[]> {
    const all = await this.redis.hgetall(this.rowsKey(sourceId, table));
    return Object.entries(all)
      .map(([id, raw]) => parseStoredRow(id, raw))
      .filter((row): row is HubRow => row !== undefined)
      .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
  }

  async listTables(sourceId?: string): Promise<HubTableRef[]> {
    const sources = sourceId === undefined ? await this.redis.smembers("hub:sources") : [sourceId];
    const refs: HubTableRef[] = [];
    for (const source of [...sources].sort()) {
      const tables = await this.redis.smembers(`hub:tables:${source}`);
      for (const table of [...tables].sort()) refs.push({ sourceId: source, table });
    }
    return refs;
  }

  async query(sourceId: string): Promise<QueryRow[]> {
    throw new QueryError(`ad-hoc queries for ${sourceId} need the sqlite hub store`);
  }

  async close(): Promise<void> {
    if (this.ownsConnection) await this.redis.quit();
  }

  private rowsKey(sourceId: string, table: string): string {
    return `hub:rows:${sourceId}:${table}`;
  }
}
