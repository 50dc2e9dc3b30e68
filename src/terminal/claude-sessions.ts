import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import { z } from 'zod';

const HistoryEntrySchema = z.object({
  display: z.string().default('?'),
  timestamp: z.number().default(0),
  project: z.string().default(''),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export interface ResumableSession {
  sessionId: string;
  label: string;
}

/**
 * Most recent prompts from the agent's history file, newest first.
 * Unreadable files and malformed lines yield nothing.
 */
export function getRecentSessions(claudeHome: string, limit = 5): HistoryEntry[] {
  const historyPath = join(claudeHome, 'history.jsonl');
  if (!existsSync(historyPath)) return [];

  let content: string;
  try {
    content = readFileSync(historyPath, 'utf-8');
  } catch {
    return [];
  }

  const entries: HistoryEntry[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = HistoryEntrySchema.safeParse(raw);
    if (parsed.success) entries.push(parsed.data);
  }

  return entries.sort((a, b) => b.timestamp - a.timestamp).slice(0, limit);
}

/**
 * Session id of the newest transcript kept for a project directory.
 * Project paths are stored with every `/` turned into `-`.
 */
export function getSessionId(claudeHome: string, projectPath: string): string | null {
  if (!projectPath) return null;

  const encoded = projectPath.replace(/\//g, '-').replace(/^-+/, '');
  for (const dirName of [`-${encoded}`, encoded]) {
    const projectDir = join(claudeHome, 'projects', dirName);
    if (!existsSync(projectDir)) continue;

    let newest: { name: string; mtimeMs: number } | null = null;
    for (const name of readdirSync(projectDir)) {
      if (!name.endsWith('.jsonl')) continue;
      const { mtimeMs } = statSync(join(projectDir, name));
      if (!newest || mtimeMs > newest.mtimeMs) newest = { name, mtimeMs };
    }
    if (newest) return basename(newest.name, '.jsonl');
  }
  return null;
}

/** Recent sessions that still have a transcript, labelled for a picker */
export function listResumableSessions(claudeHome: string, limit = 5): ResumableSession[] {
  const sessions: ResumableSession[] = [];
  for (const entry of getRecentSessions(claudeHome, limit)) {
    const sessionId = getSessionId(claudeHome, entry.project);
    if (!sessionId) continue;
    sessions.push({ sessionId, label: `${entry.display.slice(0, 40)}...` });
  }
  return sessions;
}
