import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ResponseCoordinator } from '../../src/bridge/coordinator';
import { DispatchQueue, type DispatchItem } from '../../src/bridge/dispatch-queue';
import { Dispatcher } from '../../src/bridge/dispatcher';
import { PendingMarker } from '../../src/bridge/pending-marker';
import { PromptBuilder } from '../../src/bridge/prompt-builder';
import { SessionContexts } from '../../src/bridge/session-context';
import { TypingIndicator } from '../../src/bridge/typing-indicator';
import { TranscriptTailer } from '../../src/transcript/tailer';
import { FakeTerminal, FakeTransport } from '../fakes';
import { createSilentLogger, createTempDir, removeDir } from '../helpers';

const logger = createSilentLogger();
const TMUX = {
  session: 'claude',
  agentCommand: 'claude --dangerously-skip-permissions',
  keyDelayMs: 0,
  restartDelayMs: 0,
};

function item(text: string, overrides: Partial<DispatchItem> = {}): DispatchItem {
  return { owner: '7', chatId: 7, text, kind: 'plain', enqueuedAt: Date.now(), ...overrides };
}

describe('Dispatcher', () => {
  let dir: string;
  let terminal: FakeTerminal;
  let transport: FakeTransport;
  let marker: PendingMarker;
  let sessions: SessionContexts;
  let coordinator: ResponseCoordinator;
  let typing: TypingIndicator;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    dir = createTempDir();
    terminal = new FakeTerminal();
    transport = new FakeTransport();
    marker = new PendingMarker(600_000);
    sessions = new SessionContexts();
    coordinator = new ResponseCoordinator(
      {
        transcriptsDir: dir,
        pollIntervalMs: 60_000,
        watchEnabled: false,
        maxTrackedFiles: 8,
        conversationMaxChars: 2000,
        annotationMaxChars: 5000,
      },
      { tailer: new TranscriptTailer(logger), marker, sessions, deliver: async () => {}, logger },
    );
    typing = new TypingIndicator(transport, marker, 60_000, logger);
    dispatcher = new Dispatcher(TMUX, {
      terminal,
      transport,
      coordinator,
      sessions,
      prompts: new PromptBuilder(
        { enabled: false, dbPath: ':memory:', maxResults: 5, maxContextChars: 2000 },
        { files: [], heading: 'Initial Prompt' },
        null,
        logger,
      ),
      typing,
      logger,
    });
  });

  afterEach(() => {
    typing.dispose();
    removeDir(dir);
  });

  test('types the payload, presses Enter and waits for a reply', async () => {
    await dispatcher.process(item('hello agent', { messageId: 9 }));

    expect(terminal.keys).toEqual(['text:hello agent', 'Enter']);
    expect(marker.isSet('7')).toBe(true);
    expect(coordinator.state).toBe('awaiting');
    expect(sessions.get('7')).toMatchObject({ chatId: 7, lastUserText: 'hello agent', lastPrompt: 'hello agent' });
    expect(typing.isActive('7')).toBe(true);
    expect(transport.typing).toEqual([7]);
    await vi.waitFor(() => expect(transport.reactions).toEqual([{ chatId: 7, messageId: 9, emoji: '👍' }]));
  });

  test('missing terminal is reported to the chat and nothing is pending', async () => {
    terminal.running = false;
    await dispatcher.process(item('hello'));

    expect(transport.texts()).toEqual(["tmux session 'claude' not found"]);
    expect(terminal.keys).toEqual([]);
    expect(marker.isSet()).toBe(false);
  });

  test('loop payloads become the loop command', async () => {
    await dispatcher.process(item('fix the "flaky" test', { kind: 'loop' }));

    expect(terminal.typed()).toEqual([
      '/ralph-loop:ralph-loop "fix the \\"flaky\\" test Output <promise>DONE</promise> when complete." --max-iterations 5 --completion-promise "DONE"',
    ]);
    expect(terminal.keys[1]).toBe('Enter');
    expect(transport.texts()).toEqual(['Loop started (max 5 iterations)']);
  });

  test('a keystroke failure cancels the pending reply', async () => {
    terminal.failNextText = true;
    await expect(dispatcher.process(item('lost'))).rejects.toThrow('send-keys failed');

    expect(marker.isSet()).toBe(false);
    expect(typing.isActive('7')).toBe(false);
  });

  test('two rapid messages reach the terminal once, with the newer text', async () => {
    const queue = new DispatchQueue({ coalesceMs: 10 }, dispatcher.process, logger);
    try {
      queue.enqueue(item('first thought', { messageId: 1 }));
      queue.enqueue(item('second thought', { messageId: 2 }));

      await vi.waitFor(() => expect(terminal.typed()).toEqual(['second thought']));
      await new Promise((resolve) => setTimeout(resolve, 30));
      expect(terminal.typed()).toEqual(['second thought']);
    } finally {
      queue.dispose();
    }
  });
});
