import { createChatBindingFile, createCursorFile } from './bridge/bridge-state';
import { EMPTY_CHECKPOINT, ResponseCoordinator, TailCheckpointSchema } from './bridge/coordinator';
import { DispatchQueue } from './bridge/dispatch-queue';
import { Dispatcher } from './bridge/dispatcher';
import { PendingMarker } from './bridge/pending-marker';
import { PromptBuilder } from './bridge/prompt-builder';
import { SessionContexts } from './bridge/session-context';
import { StateFile } from './bridge/state-file';
import { TypingIndicator } from './bridge/typing-indicator';
import { UpdatePoller } from './bridge/update-poller';
import { BOT_COMMANDS, CommandHandler } from './commands/handler';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { initializeMemoryDb } from './memory/schema';
import { MemoryStore } from './memory/store';
import { TelegramTransport } from './telegram/transport';
import { TmuxDriver } from './terminal/tmux';
import { TranscriptTailer } from './transcript/tailer';

const DEFAULT_CONFIG_PATH = './config/config.json';

async function main() {
  try {
    const config = loadConfig(process.env.BRIDGE_CONFIG || DEFAULT_CONFIG_PATH);
    const logger = createLogger(config.logging);

    logger.info({ session: config.tmux.session, transcripts: config.transcripts.dir }, 'Starting tmux chat bridge');

    let memory: MemoryStore | null = null;
    if (config.memory.enabled) {
      const db = initializeMemoryDb(config.memory.dbPath, logger);
      memory = new MemoryStore(db, logger.child({ component: 'memory' }));
      logger.info({ dbPath: config.memory.dbPath }, 'Memory store ready');
    }

    const transport = new TelegramTransport(config.telegram, logger.child({ component: 'telegram' }));
    const terminal = new TmuxDriver(config.tmux, logger.child({ component: 'tmux' }));
    const binding = createChatBindingFile(config.state.dir, logger);
    const cursor = createCursorFile(config.state.dir, logger);
    const sessions = new SessionContexts();
    const marker = new PendingMarker(config.response.pendingTimeoutMs);
    const typing = new TypingIndicator(transport, marker, config.response.typingIntervalMs, logger);

    const chatFor = (owner: string): number | null => {
      const ctx = sessions.get(owner);
      if (ctx) return ctx.chatId;
      const bound = binding.load();
      return bound && bound.owner === owner ? bound.chatId : null;
    };

    const coordinator = new ResponseCoordinator(
      {
        transcriptsDir: config.transcripts.dir,
        pollIntervalMs: config.transcripts.pollIntervalMs,
        watchEnabled: config.transcripts.watchEnabled,
        maxTrackedFiles: config.transcripts.maxTrackedFiles,
        conversationMaxChars: config.response.conversationMaxChars,
        annotationMaxChars: config.response.annotationMaxChars,
      },
      {
        tailer: new TranscriptTailer(logger.child({ component: 'tailer' })),
        marker,
        sessions,
        memory,
        logger: logger.child({ component: 'coordinator' }),
        checkpoint: config.transcripts.checkpointPath
          ? new StateFile(config.transcripts.checkpointPath, TailCheckpointSchema, EMPTY_CHECKPOINT, logger)
          : null,
        deliver: async (owner, text) => {
          const chatId = chatFor(owner);
          if (chatId === null) throw new Error(`No chat bound for owner ${owner}`);
          await transport.sendText(chatId, text);
          typing.stop(owner);
        },
        onReleased: () => queue.wake(),
        onTimeout: async (request) => {
          typing.stop(request.owner);
          const chatId = chatFor(request.owner);
          if (chatId === null) return;
          const minutes = Math.round(config.response.pendingTimeoutMs / 60_000);
          await transport.sendText(chatId, `⏱️ No reply from the agent after ${minutes} min, stopped waiting`);
        },
      },
    );

    const dispatcher = new Dispatcher(config.tmux, {
      terminal,
      transport,
      coordinator,
      sessions,
      prompts: new PromptBuilder(config.memory, config.metaPrompt, memory, logger),
      typing,
      logger: logger.child({ component: 'dispatch' }),
    });
    // A new message goes to the terminal only once the previous reply is in (or timed out)
    const queue = new DispatchQueue(
      { ...config.dispatch, isAwaitingReply: () => marker.isSet() },
      dispatcher.process,
      logger,
    );

    const commands = new CommandHandler(
      { tmux: config.tmux, claudeHome: config.claudeHome, allowedChats: config.telegram.allowedChats },
      { transport, terminal, coordinator, queue, marker, typing, binding, memory, logger },
    );
    const poller = new UpdatePoller(
      transport,
      cursor,
      (update) => commands.handleUpdate(update),
      { retryDelayMs: config.telegram.retryDelayMs },
      logger,
    );

    try {
      await transport.setCommands(BOT_COMMANDS);
    } catch (err) {
      logger.warn({ err }, 'Failed to register bot commands');
    }

    if (!(await terminal.exists())) {
      logger.warn({ session: config.tmux.session }, 'tmux session not found yet');
    }

    coordinator.start();
    poller.start();

    logger.info('All systems operational');
    logger.info('Press Ctrl+C to stop');

    // Handle graceful shutdown
    const shutdown = async () => {
      logger.info('Shutting down...');
      await poller.stop();
      coordinator.stop();
      queue.dispose();
      typing.dispose();
      memory?.close();
      logger.info('Shutdown complete');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

main().catch(console.error);
