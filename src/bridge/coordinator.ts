import { watch, type FSWatcher } from 'node:fs';
import { z } from 'zod';
import type { Logger } from '../logger';
import type { MemoryStore } from '../memory/store';
import { extractAnnotations } from '../transcript/annotations';
import { findLatestTranscript, listTranscripts, type TranscriptFile } from '../transcript/locator';
import type { TailRead, TranscriptTailer } from '../transcript/tailer';
import type { PendingMarker, PendingRequest } from './pending-marker';
import type { SessionContexts } from './session-context';
import type { StateFile } from './state-file';

export type CoordinatorState = 'idle' | 'awaiting' | 'delivering' | 'timed-out';

export type TriggerSource = 'watch' | 'poll' | 'manual';

export interface TailState {
  path: string;
  fileId: string;
  readOffset: number;
  seenKeys: Set<string>;
}

export const TailCheckpointSchema = z.object({
  activePath: z.string().nullable(),
  files: z.array(
    z.object({
      path: z.string(),
      fileId: z.string(),
      readOffset: z.number().int().min(0),
      seenKeys: z.array(z.string()),
    }),
  ),
});

export type TailCheckpoint = z.infer<typeof TailCheckpointSchema>;

export const EMPTY_CHECKPOINT: TailCheckpoint = { activePath: null, files: [] };

export interface ResponseCoordinatorOptions {
  transcriptsDir: string;
  pollIntervalMs: number;
  watchEnabled: boolean;
  maxTrackedFiles: number;
  conversationMaxChars: number;
  annotationMaxChars: number;
}

export interface ResponseCoordinatorDeps {
  tailer: TranscriptTailer;
  marker: PendingMarker;
  sessions: SessionContexts;
  /** Sends display text to the chat; a rejection keeps the reply pending for retry */
  deliver: (owner: string, text: string) => Promise<void>;
  logger: Logger;
  memory?: MemoryStore | null;
  checkpoint?: StateFile<TailCheckpoint> | null;
  onTimeout?: (request: PendingRequest) => Promise<void>;
  /** Picks the active log; defaults to the newest transcript under transcriptsDir */
  locate?: () => TranscriptFile | null;
  /** Every log present at start; defaults to all transcripts under transcriptsDir */
  list?: () => TranscriptFile[];
  /** Called whenever an owner stops waiting: delivered, timed out, salvaged or cancelled */
  onReleased?: (owner: string) => void;
}

/**
 * Turns transcript growth into chat replies. File-change events and a coarse
 * poll both funnel into checkForResponses(), which never runs twice at once.
 */
export class ResponseCoordinator {
  private tails = new Map<string, TailState>();
  private activePath: string | null = null;
  private checking = false;
  private currentState: CoordinatorState = 'idle';
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private watcher: FSWatcher | null = null;
  private locate: () => TranscriptFile | null;
  private list: () => TranscriptFile[];
  /** Where each untracked log ended: at start, or when its tail was evicted */
  private knownEnds = new Map<string, TranscriptFile>();

  constructor(
    private options: ResponseCoordinatorOptions,
    private deps: ResponseCoordinatorDeps,
  ) {
    this.locate = deps.locate ?? (() => findLatestTranscript(options.transcriptsDir));
    this.list = deps.list ?? (() => listTranscripts(options.transcriptsDir));
  }

  get state(): CoordinatorState {
    return this.currentState;
  }

  get activeTranscript(): string | null {
    return this.activePath;
  }

  getTailState(path: string): TailState | undefined {
    return this.tails.get(path);
  }

  start(): void {
    this.restoreCheckpoint();
    this.takeBaseline();

    if (this.options.watchEnabled) {
      this.startWatcher();
    }

    this.pollTimer = setInterval(() => this.trigger('poll'), this.options.pollIntervalMs);
    this.deps.logger.info(
      { dir: this.options.transcriptsDir, pollIntervalMs: this.options.pollIntervalMs, watch: this.watcher !== null },
      'Response coordinator started',
    );
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    this.deps.logger.info('Response coordinator stopped');
  }

  /** Called by the dispatcher right before input is handed to the terminal */
  markPending(owner: string): void {
    this.deps.marker.set(owner);
    this.currentState = 'awaiting';
  }

  trigger(source: TriggerSource): void {
    this.checkForResponses().catch((err) => {
      this.deps.logger.error({ err, source }, 'Response check crashed');
    });
  }

  /**
   * One pass of the state machine. Resolves true when a reply was delivered.
   * Returns immediately when another pass is already running.
   */
  async checkForResponses(): Promise<boolean> {
    if (this.checking) return false;
    this.checking = true;
    try {
      return await this.runCheck();
    } catch (err) {
      this.deps.logger.error({ err }, 'Response check failed');
      if (this.deps.marker.isSet()) this.currentState = 'awaiting';
      return false;
    } finally {
      this.checking = false;
    }
  }

  /**
   * Stop support: deliver whatever the transcript already shows, then stop
   * waiting regardless of the outcome.
   */
  async salvage(owner: string): Promise<boolean> {
    const delivered = this.deps.marker.isSet(owner) ? await this.checkForResponses() : false;
    if (this.deps.marker.isSet(owner)) {
      this.deps.marker.clear();
    }
    if (!this.deps.marker.isSet()) {
      this.currentState = 'idle';
    }
    this.deps.logger.info({ owner, delivered }, 'Pending reply salvaged');
    this.release(owner);
    return delivered;
  }

  /** Drop the marker of a dispatch that never reached the terminal */
  cancelPending(owner: string): void {
    if (!this.deps.marker.isSet(owner)) return;
    this.deps.marker.clear();
    this.currentState = 'idle';
    this.deps.logger.debug({ owner }, 'Pending reply cancelled');
    this.release(owner);
  }

  private async runCheck(): Promise<boolean> {
    const { marker, logger } = this.deps;
    const pending = marker.get();
    const file = this.locate();

    if (!pending) {
      // Track the log while idle so its existing history is never replayed
      if (file) this.adopt(file, false);
      this.currentState = 'idle';
      return false;
    }

    if (marker.isExpired()) {
      this.currentState = 'timed-out';
      logger.warn({ owner: pending.owner, ageMs: marker.age() }, 'No reply before timeout, clearing pending marker');
      marker.clear();
      this.currentState = 'idle';
      this.release(pending.owner);
      await this.notifyTimeout(pending);
      return false;
    }

    if (!file) return false;

    const tail = this.adopt(file, true);
    const read = await this.deps.tailer.readNew(file.path, tail.readOffset, tail.seenKeys);
    if (!read.text) return false;

    this.currentState = 'delivering';
    const { displayText, annotationText } = extractAnnotations(read.text);

    if (!displayText) {
      // Annotation-only turn: keep it, deliver nothing, keep waiting for prose
      this.commit(tail, read);
      this.persist(pending.owner, '', annotationText);
      this.currentState = 'awaiting';
      logger.debug({ owner: pending.owner }, 'Turn had no user-visible text');
      return false;
    }

    try {
      await this.deps.deliver(pending.owner, displayText);
    } catch (err) {
      logger.warn({ err, owner: pending.owner }, 'Delivery failed, will retry on next trigger');
      this.currentState = 'awaiting';
      return false;
    }

    this.commit(tail, read);
    this.persist(pending.owner, displayText, annotationText);
    this.deps.sessions.completeExchange(pending.owner);

    // A newer dispatch may have replaced the marker while we were delivering
    if (marker.get() === pending) {
      marker.clear();
      this.release(pending.owner);
    }
    this.currentState = marker.isSet() ? 'awaiting' : 'idle';

    logger.info(
      { owner: pending.owner, chars: displayText.length, annotation: annotationText.length > 0, offset: read.offset },
      'Reply delivered',
    );
    return true;
  }

  /**
   * Make file the active log, reusing its saved position when it was seen
   * before. A brand-new file starts at 0 while a reply is awaited and at its
   * current end otherwise; while idle a known file is moved to its end.
   */
  private adopt(file: TranscriptFile, awaiting: boolean): TailState {
    const { logger } = this.deps;
    let tail = this.tails.get(file.path);

    if (tail && (tail.fileId !== file.fileId || file.size < tail.readOffset)) {
      logger.info({ path: file.path, previousOffset: tail.readOffset, size: file.size }, 'Transcript replaced, restarting tail');
      this.tails.delete(file.path);
      tail = undefined;
    }

    if (!tail) {
      tail = {
        path: file.path,
        fileId: file.fileId,
        readOffset: awaiting ? this.firstOffset(file) : file.size,
        seenKeys: new Set(),
      };
    } else if (!awaiting && tail.readOffset < file.size) {
      // Output written while nobody was waiting is never delivered later
      tail.readOffset = file.size;
    }

    this.knownEnds.delete(file.path);

    if (this.activePath !== file.path) {
      logger.info({ from: this.activePath, to: file.path, offset: tail.readOffset }, 'Switched active transcript');
      this.activePath = file.path;
    }

    // Re-insert to keep the map in recency order, then evict the oldest
    this.tails.delete(file.path);
    this.tails.set(file.path, tail);
    while (this.tails.size > this.options.maxTrackedFiles) {
      const oldest = this.tails.values().next();
      if (oldest.done) break;
      const evicted = oldest.value;
      this.tails.delete(evicted.path);
      // Coming back to an evicted log resumes where it was left
      this.knownEnds.set(evicted.path, {
        path: evicted.path,
        fileId: evicted.fileId,
        size: evicted.readOffset,
        mtimeMs: 0,
      });
    }

    return tail;
  }

  /**
   * Where a log first seen while a reply is awaited starts: where it ended
   * at start (or at eviction) for a known log, 0 for one created since.
   */
  private firstOffset(file: TranscriptFile): number {
    const known = this.knownEnds.get(file.path);
    if (!known || known.fileId !== file.fileId || file.size < known.size) return 0;
    return known.size;
  }

  /** Remember where every existing log ends so none of its history is replayed */
  private takeBaseline(): void {
    this.knownEnds.clear();
    for (const file of this.list()) {
      if (!this.tails.has(file.path)) this.knownEnds.set(file.path, file);
    }

    const active = this.locate();
    if (active && !this.deps.marker.isSet()) {
      this.adopt(active, false);
    }
    this.deps.logger.debug({ files: this.knownEnds.size, active: active?.path ?? null }, 'Transcript baseline taken');
  }

  private release(owner: string): void {
    this.deps.onReleased?.(owner);
  }

  private commit(tail: TailState, read: TailRead): void {
    tail.readOffset = read.offset;
    tail.seenKeys = read.seenKeys;
    this.saveCheckpoint();
  }

  private persist(owner: string, displayText: string, annotationText: string): void {
    const { memory, sessions, logger } = this.deps;
    if (!memory) return;

    const userText = sessions.get(owner)?.lastUserText;
    if (displayText && userText) {
      const reply = displayText.slice(0, this.options.conversationMaxChars);
      if (!memory.add(owner, `Q: ${userText}\nA: ${reply}`, { source: 'conversation' }, 'conversation')) {
        logger.warn({ owner }, 'Conversation not saved to memory');
      }
    }

    if (annotationText) {
      const note = annotationText.slice(0, this.options.annotationMaxChars);
      if (!memory.add(owner, note, { source: 'auto-extracted' }, 'auto-update')) {
        logger.warn({ owner }, 'Annotation not saved to memory');
      }
    }
  }

  private async notifyTimeout(request: PendingRequest): Promise<void> {
    if (!this.deps.onTimeout) return;
    try {
      await this.deps.onTimeout(request);
    } catch (err) {
      this.deps.logger.warn({ err, owner: request.owner }, 'Timeout notification failed');
    }
  }

  private restoreCheckpoint(): void {
    const { checkpoint, logger } = this.deps;
    if (!checkpoint) return;

    const saved = checkpoint.load();
    for (const file of saved.files.slice(-this.options.maxTrackedFiles)) {
      this.tails.set(file.path, {
        path: file.path,
        fileId: file.fileId,
        readOffset: file.readOffset,
        seenKeys: new Set(file.seenKeys),
      });
    }
    this.activePath = saved.activePath;
    if (saved.files.length > 0) {
      logger.info({ files: this.tails.size, activePath: saved.activePath }, 'Tail checkpoint restored');
    }
  }

  private saveCheckpoint(): void {
    const { checkpoint, logger } = this.deps;
    if (!checkpoint) return;

    try {
      checkpoint.save({
        activePath: this.activePath,
        files: [...this.tails.values()].map((tail) => ({
          path: tail.path,
          fileId: tail.fileId,
          readOffset: tail.readOffset,
          seenKeys: [...tail.seenKeys],
        })),
      });
    } catch (err) {
      logger.warn({ err }, 'Failed to write tail checkpoint');
    }
  }

  private startWatcher(): void {
    try {
      this.watcher = watch(this.options.transcriptsDir, { recursive: true }, (_event, filename) => {
        if (!filename || !filename.toString().endsWith('.jsonl')) return;
        this.trigger('watch');
      });
      this.watcher.on('error', (err) => {
        this.deps.logger.warn({ err }, 'Transcript watcher failed, relying on polling');
        this.watcher?.close();
        this.watcher = null;
      });
    } catch (err) {
      this.deps.logger.warn({ err, dir: this.options.transcriptsDir }, 'Failed to start transcript watcher, relying on polling');
      this.watcher = null;
    }
  }
}
