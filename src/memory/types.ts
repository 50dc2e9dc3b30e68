export const MEMORY_KINDS = ['conversation', 'manual-note', 'auto-update'] as const;

export type MemoryKind = (typeof MEMORY_KINDS)[number];

export type MemoryMetadata = Record<string, unknown>;

export interface MemoryRecord {
  id: string;
  owner: string;
  content: string;
  createdAt: string;
  metadata: MemoryMetadata | null;
  kind: MemoryKind;
}

export interface MemorySearchResult extends MemoryRecord {
  /** bm25 rank, lower is more relevant */
  rank: number;
}

export interface MemoryStats {
  count: number;
  newest: string | null;
  oldest: string | null;
  countsByKind: Partial<Record<MemoryKind, number>>;
}

export function isMemoryKind(value: string): value is MemoryKind {
  return (MEMORY_KINDS as readonly string[]).includes(value);
}
