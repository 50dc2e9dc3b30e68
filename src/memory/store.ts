import { createHash } from 'node:crypto';
import type { Logger } from '../logger';
import type { MemoryDatabase } from './schema';
import {
  isMemoryKind,
  type MemoryKind,
  type MemoryMetadata,
  type MemoryRecord,
  type MemorySearchResult,
  type MemoryStats,
} from './types';

export const MAX_CONTENT_LENGTH = 10_000;
const DELETE_BY_QUERY_LIMIT = 100;
const INJECTION_HEADER = '[Relevant memories]';

interface MemoryRow {
  id: string;
  owner: string;
  content: string;
  created_at: string;
  metadata: string | null;
  kind: string;
}

interface SearchRow extends MemoryRow {
  rank: number;
}

interface StatsRow {
  count: number;
  newest: string | null;
  oldest: string | null;
}

export interface MemoryStoreOptions {
  /** Clock used for timestamps and fingerprints */
  now?: () => Date;
}

/**
 * Turn free text into an FTS5 MATCH expression: every token of two or more
 * characters becomes a quoted prefix term, and all terms must match.
 * Returns '' when nothing usable is left.
 */
export function buildMatchQuery(query: string): string {
  const tokens = query
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((t) => t.length >= 2);

  return tokens.map((t) => `"${t}"*`).join(' AND ');
}

/**
 * Render records as a bulleted block for prompt injection. Stops before the
 * block would exceed maxChars; record order is preserved.
 */
export function formatForInjection(records: MemoryRecord[], maxChars = 2000): string {
  if (records.length === 0) return '';

  const lines = [INJECTION_HEADER, ''];
  let currentLen = INJECTION_HEADER.length + 2;

  for (const record of records) {
    const line = `• ${record.content.replace(/\s*\n\s*/g, ' ')}`;
    if (currentLen + line.length + 1 > maxChars) break;
    lines.push(line);
    currentLen += line.length + 1;
  }

  if (lines.length === 2) return '';
  return lines.join('\n');
}

function fingerprint(owner: string, content: string, at: Date): string {
  const bucket = Math.floor(at.getTime() / 1000);
  return createHash('sha256').update(`${owner}:${content}:${bucket}`).digest('hex').slice(0, 32);
}

function parseMetadata(raw: string | null): MemoryMetadata | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

function rowToRecord(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    owner: row.owner,
    content: row.content,
    createdAt: row.created_at,
    metadata: parseMetadata(row.metadata),
    kind: isMemoryKind(row.kind) ? row.kind : 'conversation',
  };
}

/**
 * Durable per-owner memory with full-text search. Every query is scoped to
 * exactly one owner. Failures are logged and reported through the return
 * value; nothing here throws to the caller.
 */
export class MemoryStore {
  private now: () => Date;

  constructor(
    private db: MemoryDatabase,
    private logger: Logger,
    opts: MemoryStoreOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  add(
    owner: string,
    content: string,
    metadata: MemoryMetadata | null = null,
    kind: MemoryKind = 'conversation',
  ): boolean {
    const trimmed = content.trim();
    if (!trimmed) return false;

    const body = trimmed.slice(0, MAX_CONTENT_LENGTH);
    const at = this.now();
    const id = fingerprint(owner, body, at);
    const metadataJson = metadata ? JSON.stringify(metadata) : null;

    try {
      const upsert = this.db.transaction(() => {
        const newest = this.db
          .prepare<[string], { newest: string | null }>(
            'SELECT MAX(created_at) AS newest FROM memories WHERE owner = ?',
          )
          .get(owner);

        // created_at never goes backwards within an owner
        let createdAt = at.toISOString();
        if (newest?.newest && newest.newest > createdAt) {
          createdAt = newest.newest;
        }

        this.db
          .prepare(
            `INSERT INTO memories (id, owner, content, created_at, metadata, kind)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(id) DO UPDATE SET
               content = excluded.content,
               metadata = excluded.metadata,
               kind = excluded.kind`,
          )
          .run(id, owner, body, createdAt, metadataJson, kind);
      });
      upsert();

      this.logger.debug({ owner, id, kind, length: body.length }, 'Memory stored');
      return true;
    } catch (err) {
      this.logger.warn({ err, owner, kind }, 'Failed to add memory');
      return false;
    }
  }

  get(owner: string, id: string): MemoryRecord | null {
    try {
      const row = this.db
        .prepare<[string, string], MemoryRow>(
          'SELECT id, owner, content, created_at, metadata, kind FROM memories WHERE id = ? AND owner = ?',
        )
        .get(id, owner);
      return row ? rowToRecord(row) : null;
    } catch (err) {
      this.logger.warn({ err, owner, id }, 'Failed to read memory');
      return null;
    }
  }

  search(owner: string, query: string, limit = 5): MemorySearchResult[] {
    const match = buildMatchQuery(query);
    if (!match) return [];

    try {
      const rows = this.db
        .prepare<[string, string, number], SearchRow>(
          `SELECT m.id, m.owner, m.content, m.created_at, m.metadata, m.kind, bm25(memories_fts) AS rank
           FROM memories_fts
           JOIN memories m ON m.seq = memories_fts.rowid
           WHERE memories_fts MATCH ? AND m.owner = ?
           ORDER BY rank
           LIMIT ?`,
        )
        .all(match, owner, limit);

      this.logger.debug({ owner, query: query.slice(0, 50), hits: rows.length }, 'Memory search completed');
      return rows.map((row) => ({ ...rowToRecord(row), rank: row.rank }));
    } catch (err) {
      this.logger.warn({ err, owner, match }, 'Memory search failed');
      return [];
    }
  }

  getRecent(owner: string, limit = 10): MemoryRecord[] {
    try {
      const rows = this.db
        .prepare<[string, number], MemoryRow>(
          `SELECT id, owner, content, created_at, metadata, kind FROM memories
           WHERE owner = ?
           ORDER BY created_at DESC, seq DESC
           LIMIT ?`,
        )
        .all(owner, limit);
      return rows.map(rowToRecord);
    } catch (err) {
      this.logger.warn({ err, owner }, 'Failed to read recent memories');
      return [];
    }
  }

  getByKind(owner: string, kind: MemoryKind, limit = 10): MemoryRecord[] {
    try {
      const rows = this.db
        .prepare<[string, string, number], MemoryRow>(
          `SELECT id, owner, content, created_at, metadata, kind FROM memories
           WHERE owner = ? AND kind = ?
           ORDER BY created_at DESC, seq DESC
           LIMIT ?`,
        )
        .all(owner, kind, limit);
      return rows.map(rowToRecord);
    } catch (err) {
      this.logger.warn({ err, owner, kind }, 'Failed to read memories by kind');
      return [];
    }
  }

  delete(owner: string, id: string): boolean {
    try {
      const result = this.db.prepare('DELETE FROM memories WHERE id = ? AND owner = ?').run(id, owner);
      const deleted = result.changes > 0;
      if (deleted) {
        this.logger.debug({ owner, id }, 'Memory deleted');
      }
      return deleted;
    } catch (err) {
      this.logger.warn({ err, owner, id }, 'Failed to delete memory');
      return false;
    }
  }

  deleteByQuery(owner: string, query: string): number {
    const matches = this.search(owner, query, DELETE_BY_QUERY_LIMIT);
    let count = 0;
    for (const match of matches) {
      if (this.delete(owner, match.id)) count++;
    }
    return count;
  }

  clearAll(owner: string): boolean {
    try {
      const result = this.db.prepare('DELETE FROM memories WHERE owner = ?').run(owner);
      this.logger.info({ owner, removed: result.changes }, 'Memories cleared');
      return true;
    } catch (err) {
      this.logger.warn({ err, owner }, 'Failed to clear memories');
      return false;
    }
  }

  stats(owner: string): MemoryStats {
    try {
      const totals = this.db
        .prepare<[string], StatsRow>(
          'SELECT COUNT(*) AS count, MAX(created_at) AS newest, MIN(created_at) AS oldest FROM memories WHERE owner = ?',
        )
        .get(owner);

      const byKind = this.db
        .prepare<[string], { kind: string; count: number }>(
          'SELECT kind, COUNT(*) AS count FROM memories WHERE owner = ? GROUP BY kind',
        )
        .all(owner);

      const countsByKind: MemoryStats['countsByKind'] = {};
      for (const row of byKind) {
        if (isMemoryKind(row.kind)) countsByKind[row.kind] = row.count;
      }

      return {
        count: totals?.count ?? 0,
        newest: totals?.newest ?? null,
        oldest: totals?.oldest ?? null,
        countsByKind,
      };
    } catch (err) {
      this.logger.warn({ err, owner }, 'Failed to compute memory stats');
      return { count: 0, newest: null, oldest: null, countsByKind: {} };
    }
  }

  close(): void {
    this.db.close();
  }
}
