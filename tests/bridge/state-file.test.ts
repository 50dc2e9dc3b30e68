import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createChatBindingFile, createCursorFile } from '../../src/bridge/bridge-state';
import { createSilentLogger, createTempDir, removeDir } from '../helpers';

const logger = createSilentLogger();

describe('StateFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('cursor defaults to 0 when absent', () => {
    expect(createCursorFile(dir, logger).load()).toBe(0);
  });

  test('cursor round-trips and creates its directory', () => {
    const stateDir = join(dir, 'nested', 'state');
    createCursorFile(stateDir, logger).save(1234);

    expect(createCursorFile(stateDir, logger).load()).toBe(1234);
    expect(existsSync(join(stateDir, 'telegram-offset.json.tmp'))).toBe(false);
  });

  test('corrupt cursor file falls back to 0', () => {
    writeFileSync(join(dir, 'telegram-offset.json'), '{not json');
    expect(createCursorFile(dir, logger).load()).toBe(0);
  });

  test('cursor of the wrong shape falls back to 0', () => {
    writeFileSync(join(dir, 'telegram-offset.json'), '-5');
    expect(createCursorFile(dir, logger).load()).toBe(0);
  });

  test('unreadable path falls back to the default', () => {
    mkdirSync(join(dir, 'telegram-offset.json'));
    expect(createCursorFile(dir, logger).load()).toBe(0);
  });

  test('chat binding round-trips and defaults to null', () => {
    const binding = createChatBindingFile(dir, logger);
    expect(binding.load()).toBeNull();

    binding.save({ owner: '99', chatId: 99, boundAt: '2026-01-01T00:00:00.000Z' });
    expect(createChatBindingFile(dir, logger).load()).toEqual({
      owner: '99',
      chatId: 99,
      boundAt: '2026-01-01T00:00:00.000Z',
    });
  });

  test('chat binding missing fields falls back to null', () => {
    writeFileSync(join(dir, 'chat-binding.json'), JSON.stringify({ chatId: 1 }));
    expect(createChatBindingFile(dir, logger).load()).toBeNull();
  });
});
