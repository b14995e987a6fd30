import { EventEmitter } from "node:events";
import { open, stat } from "node:fs/promises";
import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import { errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

export interface LogRecord {
  text: string;
  timestampMs?: number;
}

export type LogListener = (record: LogRecord) => void;

/** A host log stream a session can attach to. */
export interface LogSink {
  subscribe(listener: LogListener): () => void;
}

/** In-process sink: the host writes lines, subscribers receive them synchronously. */
export class EmitterLogSink implements LogSink {
  private readonly emitter = new EventEmitter();

  write(text: string, timestampMs?: number): void {
    for (const line of text.split(/\r?\n/)) {
      if (!line.trim()) continue;
      const record: LogRecord = timestampMs === undefined ? { text: line } : { text: line, timestampMs };
      this.emitter.emit("line", record);
    }
  }

  subscribe(listener: LogListener): () => void {
    this.emitter.on("line", listener);
    return () => {
      this.emitter.off("line", listener);
    };
  }
}

export interface FileLogSinkOptions {
  /** Replay existing content before following appends. */
  fromStart?: boolean;
  logger?: Logger;
}

const NEWLINE = 0x0a;

/**
 * Follows a log file that the host appends to. Complete lines are delivered
 * in order; a trailing partial line waits for its newline.
 */
export class FileLogSink implements LogSink {
  private readonly emitter = new EventEmitter();
  private readonly filePath: string;
  private readonly fromStart: boolean;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;
  private offset = 0;
  private pending: Buffer = Buffer.alloc(0);
  private readChain: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: FileLogSinkOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.fromStart = options.fromStart ?? false;
    this.logger = options.logger ?? silentLogger();
  }

  subscribe(listener: LogListener): () => void {
    this.emitter.on("line", listener);
    return () => {
      this.emitter.off("line", listener);
    };
  }

  async start(): Promise<void> {
    if (this.watcher) return;
    const initial = await stat(this.filePath).catch(() => null);
    this.offset = this.fromStart || !initial ? 0 : initial.size;

    this.watcher = chokidar.watch(this.filePath, {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: 50,
        pollInterval: 20,
      },
    });
    const onChange = (): void => {
      void this.poll();
    };
    this.watcher.on("add", onChange);
    this.watcher.on("change", onChange);
    this.watcher.on("error", (error) => {
      this.logger.warn({ file: this.filePath, err: errorMessage(error) }, "log file watcher error");
    });

    if (this.fromStart) {
      await this.poll();
    }
  }

  /** Reads whatever was appended since the last read. Calls are serialized. */
  poll(): Promise<void> {
    this.readChain = this.readChain.then(
      () => this.readAppended(),
      () => this.readAppended(),
    );
    return this.readChain.catch((error: unknown) => {
      this.logger.warn({ file: this.filePath, err: errorMessage(error) }, "log file read failed");
    });
  }

  /** Stops following; a trailing line without newline is delivered. */
  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    await this.poll();
    if (this.pending.length > 0) {
      this.deliver(this.pending.toString("utf8"));
      this.pending = Buffer.alloc(0);
    }
  }

  private async readAppended(): Promise<void> {
    const current = await stat(this.filePath).catch(() => null);
    if (!current) return;
    if (current.size < this.offset) {
      // Truncated or rotated: start over.
      this.offset = 0;
      this.pending = Buffer.alloc(0);
    }
    const length = current.size - this.offset;
    if (length <= 0) return;

    const chunk = await this.readChunk(this.offset, length);
    this.offset += chunk.length;
    const combined = Buffer.concat([this.pending, chunk]);
    const lastNewline = combined.lastIndexOf(NEWLINE);
    if (lastNewline < 0) {
      this.pending = combined;
      return;
    }
    this.pending = combined.subarray(lastNewline + 1);
    this.deliver(combined.subarray(0, lastNewline).toString("utf8"));
  }

  private deliver(text: string): void {
    for (const line of text.split(/\r?\n/)) {
      if (!line.trim()) continue;
      const record: LogRecord = { text: line };
      this.emitter.emit("line", record);
    }
  }

  private async readChunk(offset: number, length: number): Promise<Buffer> {
    const fileHandle = await open(this.filePath, "r");
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, offset);
      return buffer.subarray(0, bytesRead);
    } finally {
      await fileHandle.close();
    }
  }
}
