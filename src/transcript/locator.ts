import { readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import { join } from 'node:path';

export interface TranscriptFile {
  path: string;
  /** device:inode, changes when a file is replaced under the same name */
  fileId: string;
  size: number;
  mtimeMs: number;
}

export function describeFile(path: string, stats: Stats): TranscriptFile {
  return {
    path,
    fileId: `${stats.dev}:${stats.ino}`,
    size: stats.size,
    mtimeMs: stats.mtimeMs,
  };
}

/** Stat a transcript; null when it is gone */
export function statTranscript(path: string): TranscriptFile | null {
  try {
    return describeFile(path, statSync(path));
  } catch {
    return null;
  }
}

/**
 * Every `*.jsonl` file in dir or its immediate subdirectories
 * (the agent keeps one directory per project).
 */
export function listTranscripts(dir: string, maxDepth = 2): TranscriptFile[] {
  const files: TranscriptFile[] = [];

  const visit = (current: string, depth: number): void => {
    let entries: Dirent[];
    try {
      entries = readdirSync(current, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        if (depth < maxDepth) visit(fullPath, depth + 1);
        continue;
      }
      if (!entry.isFile() || !entry.name.endsWith('.jsonl')) continue;

      const file = statTranscript(fullPath);
      if (file) files.push(file);
    }
  };

  visit(dir, 1);
  return files;
}

/** Most recently modified transcript, null when there is none */
export function findLatestTranscript(dir: string, maxDepth = 2): TranscriptFile | null {
  let latest: TranscriptFile | null = null;
  for (const file of listTranscripts(dir, maxDepth)) {
    if (!latest || file.mtimeMs > latest.mtimeMs) latest = file;
  }
  return latest;
}
