import { open } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from '../logger';
import { SegmentSchema, renderSegment } from './segments';

export const SEEN_KEYS_CAP = 5000;

const NEWLINE = 0x0a;
const FRAGMENT_SEPARATOR = '\n\n';
const EVENT_SEPARATOR = '\n\n\n';

const EventSchema = z
  .object({
    type: z.string().optional(),
    message: z
      .object({
        role: z.string().optional(),
        content: z.union([z.string(), z.array(z.unknown())]).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type TranscriptEvent = z.infer<typeof EventSchema>;

export interface TailRead {
  /** Rendered agent output appended since readOffset, '' when none */
  text: string;
  /** Offset to pass next time; unchanged unless text is non-empty */
  offset: number;
  seenKeys: Set<string>;
}

export function lineKey(path: string, startOffset: number): string {
  return `${path}:${startOffset}`;
}

function isAgentEvent(event: TranscriptEvent): boolean {
  return event.type === 'assistant' || event.message?.role === 'assistant';
}

/**
 * Incremental reader over an append-only JSONL event log. Stateless between
 * calls: the caller owns the offset and seen-line keys and hands them back in.
 */
export class TranscriptTailer {
  constructor(private logger: Logger) {}

  async readNew(path: string, readOffset: number, seenKeys: ReadonlySet<string>): Promise<TailRead> {
    const unchanged: TailRead = { text: '', offset: readOffset, seenKeys: new Set(seenKeys) };

    let data: Buffer;
    try {
      data = await readFrom(path, readOffset);
    } catch (err) {
      if (isMissingFile(err)) return unchanged;
      this.logger.warn({ err, path }, 'Failed to read transcript');
      return unchanged;
    }

    const events: string[] = [];
    const processed: string[] = [];
    let endOffset = readOffset;
    let lineStart = 0;

    while (lineStart < data.length) {
      const newline = data.indexOf(NEWLINE, lineStart);
      // A line without its newline is still being written
      if (newline === -1) break;

      const start = lineStart;
      lineStart = newline + 1;

      // Positions in data are relative to readOffset
      const fileOffset = readOffset + start;
      const key = lineKey(path, fileOffset);
      if (seenKeys.has(key)) continue;

      processed.push(key);
      endOffset = readOffset + lineStart;

      const line = data.toString('utf-8', start, newline).trim();
      if (!line) continue;

      const rendered = this.renderLine(line, path, fileOffset);
      if (rendered) events.push(rendered);
    }

    if (events.length === 0) return unchanged;

    const nextKeys = new Set(seenKeys);
    for (const key of processed) nextKeys.add(key);
    pruneOldest(nextKeys, SEEN_KEYS_CAP);

    return {
      text: events.join(EVENT_SEPARATOR),
      offset: endOffset,
      seenKeys: nextKeys,
    };
  }

  private renderLine(line: string, path: string, offset: number): string | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      this.logger.debug({ path, offset }, 'Skipping malformed transcript line');
      return null;
    }

    const parsed = EventSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug({ path, offset }, 'Skipping transcript line with unexpected shape');
      return null;
    }

    const event = parsed.data;
    if (!isAgentEvent(event)) return null;

    const content = event.message?.content;
    if (content === undefined) return null;
    if (typeof content === 'string') {
      return renderSegment({ type: 'text', text: content });
    }

    const fragments: string[] = [];
    for (const item of content) {
      const segment = SegmentSchema.safeParse(item);
      if (!segment.success) continue;
      const fragment = renderSegment(segment.data);
      if (fragment) fragments.push(fragment);
    }

    return fragments.length > 0 ? fragments.join(FRAGMENT_SEPARATOR) : null;
  }
}

/** Bytes from offset to the current end of the file */
async function readFrom(path: string, offset: number): Promise<Buffer> {
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    if (size <= offset) return Buffer.alloc(0);

    const buffer = Buffer.alloc(size - offset);
    let filled = 0;
    while (filled < buffer.length) {
      const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, offset + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return buffer.subarray(0, filled);
  } finally {
    await handle.close();
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Drop the oldest keys (Set preserves insertion order) */
function pruneOldest(keys: Set<string>, cap: number): void {
  if (keys.size <= cap) return;
  let excess = keys.size - cap;
  for (const key of keys) {
    if (excess <= 0) break;
    keys.delete(key);
    excess--;
  }
}
