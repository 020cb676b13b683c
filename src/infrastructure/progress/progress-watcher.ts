import type { Stats } from 'node:fs';
import { open, stat } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { EventStore } from '../../application/event-store.js';
import { parseProgressLine, toPhaseDraft } from '../../application/progress-line.js';
import { PipelineError, WatchSourceUnavailable } from '../../domain/index.js';

export interface ProgressWatcherOptions {
  file: string;
  intervalMs: number;
  store: EventStore;
  log: Logger;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Tails the progress log by polling.
 *
 * - starts at the end of whatever already exists
 * - reads only bytes appended since the last offset
 * - buffers a trailing partial line until its newline arrives
 * - re-reads from offset 0 after truncation or rotation (inode change)
 * - a missing file is logged once per outage, polling continues
 */
export class ProgressWatcher {
  private readonly file: string;
  private readonly intervalMs: number;
  private readonly store: EventStore;
  private readonly log: Logger;

  private offset = 0;
  private inode: number | null = null;
  private remainder: Buffer = Buffer.alloc(0);
  private missing = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(options: ProgressWatcherOptions) {
    this.file = options.file;
    this.intervalMs = options.intervalMs;
    this.store = options.store;
    this.log = options.log;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  async start(): Promise<void> {
    if (this.running) return;
    await this.prime();
    this.running = true;
    this.schedule();
    this.log.info({ file: this.file, intervalMs: this.intervalMs }, 'Progress watcher started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log.info({ file: this.file }, 'Progress watcher stopped');
  }

  /**
   * Moves the offset to the current end of file so existing history is
   * not replayed. A missing or unreadable file starts the watcher at
   * offset 0; later polls keep retrying it.
   */
  async prime(): Promise<void> {
    try {
      const info = await stat(this.file);
      this.offset = info.size;
      this.inode = info.ino;
    } catch (err: unknown) {
      this.reportUnavailable(err);
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Polling                                                           */
  /* ------------------------------------------------------------------ */

  /**
   * One polling pass. Returns the number of phase lines appended to the store.
   */
  async poll(): Promise<number> {
    let info: Stats;
    try {
      info = await stat(this.file);
    } catch (err: unknown) {
      if (!isMissing(err)) throw new WatchSourceUnavailable(this.file, { cause: err });
      this.reportUnavailable(err);
      return 0;
    }

    if (this.missing) {
      this.missing = false;
      this.log.info({ file: this.file }, 'Progress log available again');
    }

    if (this.inode !== null && info.ino !== this.inode) {
      this.log.info({ file: this.file }, 'Progress log rotated, reading from start');
      this.reset();
    } else if (info.size < this.offset) {
      this.log.info({ file: this.file, size: info.size, offset: this.offset }, 'Progress log truncated, reading from start');
      this.reset();
    }
    this.inode = info.ino;

    if (info.size === this.offset) return 0;

    const chunk = await this.readFrom(this.offset, info.size - this.offset);
    this.offset += chunk.length;

    // Split on the last newline byte so a multi-byte character is never cut.
    const pending = Buffer.concat([this.remainder, chunk]);
    const end = pending.lastIndexOf(0x0a);
    if (end === -1) {
      this.remainder = pending;
      return 0;
    }
    this.remainder = Buffer.from(pending.subarray(end + 1));
    const lines = pending.subarray(0, end).toString('utf-8').split('\n');

    let appended = 0;
    for (const raw of lines) {
      const line = parseProgressLine(raw.replace(/\r$/, ''));
      if (!line) continue;
      try {
        this.store.append(toPhaseDraft(line));
        appended++;
      } catch (err: unknown) {
        this.log.warn({ err, line: raw }, 'Rejected progress line');
      }
    }
    return appended;
  }

  /* ------------------------------------------------------------------ */
  /*  Private                                                           */
  /* ------------------------------------------------------------------ */

  private async readFrom(position: number, length: number): Promise<Buffer> {
    const handle = await open(this.file, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  private reset(): void {
    this.offset = 0;
    this.remainder = Buffer.alloc(0);
  }

  private reportUnavailable(err: unknown): void {
    if (!this.missing) {
      this.missing = true;
      this.log.warn({ err: new WatchSourceUnavailable(this.file, { cause: err }) }, 'Progress log unavailable');
    }
    this.inode = null;
    this.reset();
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    try {
      await this.poll();
    } catch (err: unknown) {
      const level = err instanceof PipelineError ? 'warn' : 'error';
      this.log[level]({ err, file: this.file }, 'Progress poll failed');
    } finally {
      this.schedule();
    }
  }
}
