import { mkdirSync, utimesSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { getRecentSessions, getSessionId, listResumableSessions } from '../../src/terminal/claude-sessions';
import { createTempDir, removeDir } from '../helpers';

function historyLine(display: string, timestamp: number, project: string): string {
  return JSON.stringify({ display, timestamp, project });
}

describe('agent session history', () => {
  let home: string;

  beforeEach(() => {
    home = createTempDir('claude-home-');
  });

  afterEach(() => {
    removeDir(home);
  });

  function writeTranscript(dirName: string, name: string, mtimeSec: number): void {
    const dir = join(home, 'projects', dirName);
    mkdirSync(dir, { recursive: true });
    const path = join(dir, name);
    writeFileSync(path, '');
    utimesSync(path, mtimeSec, mtimeSec);
  }

  test('getRecentSessions returns nothing without a history file', () => {
    expect(getRecentSessions(home)).toEqual([]);
  });

  test('getRecentSessions sorts newest first and skips bad lines', () => {
    writeFileSync(
      join(home, 'history.jsonl'),
      [historyLine('first', 10, '/a'), 'not json', '', historyLine('third', 30, '/c'), historyLine('second', 20, '/b')].join(
        '\n',
      ),
    );

    expect(getRecentSessions(home).map((e) => e.display)).toEqual(['third', 'second', 'first']);
    expect(getRecentSessions(home, 2).map((e) => e.display)).toEqual(['third', 'second']);
  });

  test('getRecentSessions fills in missing fields', () => {
    writeFileSync(join(home, 'history.jsonl'), '{}\n');
    expect(getRecentSessions(home)).toEqual([{ display: '?', timestamp: 0, project: '' }]);
  });

  test('getSessionId picks the newest transcript of the project', () => {
    writeTranscript('-work-app', 'older.jsonl', 1_000);
    writeTranscript('-work-app', 'newer.jsonl', 2_000);
    writeTranscript('-work-app', 'notes.txt', 3_000);

    expect(getSessionId(home, '/work/app')).toBe('newer');
  });

  test('getSessionId falls back to the name without a leading dash', () => {
    writeTranscript('rel-dir', 'abc.jsonl', 1_000);
    expect(getSessionId(home, 'rel/dir')).toBe('abc');
  });

  test('getSessionId returns null for unknown or empty projects', () => {
    expect(getSessionId(home, '/nowhere')).toBeNull();
    expect(getSessionId(home, '')).toBeNull();
  });

  test('listResumableSessions labels sessions that still have a transcript', () => {
    writeTranscript('-work-app', 'sess-1.jsonl', 1_000);
    writeFileSync(
      join(home, 'history.jsonl'),
      [
        historyLine('a prompt that is definitely longer than forty characters', 2, '/work/app'),
        historyLine('gone', 3, '/deleted/project'),
      ].join('\n'),
    );

    expect(listResumableSessions(home)).toEqual([
      { sessionId: 'sess-1', label: 'a prompt that is definitely longer than ...' },
    ]);
  });
});
