/**
 * Output sinks. A file sink is opened (and truncated) lazily, only once
 * something is about to be written, and must always be closed.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { IOError, describeCause } from '../errors.js';

export type SinkTarget = { kind: 'stdout' } | { kind: 'file'; path: string };

export interface Sink {
  readonly description: string;
  write(chunk: string): Promise<void>;
  /** Flush and release. Idempotent. */
  close(): Promise<void>;
}

/** Wraps an already-open stream such as stdout. Closing only drains it. */
export class StreamSink implements Sink {
  readonly description: string;
  private readonly stream: Writable;

  constructor(stream: Writable, description = 'standard output') {
    this.stream = stream;
    this.description = description;
  }

  write(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, 'utf-8', (error) => {
        if (error) {
          reject(new IOError(`Failed to write to ${this.description}: ${describeCause(error)}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    // stdout stays open for the rest of the process
  }
}

export class FileSink implements Sink {
  readonly description: string;
  private readonly path: string;
  private handle: FileHandle | null = null;

  private constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.description = path;
    this.handle = handle;
  }

  static async open(path: string): Promise<FileSink> {
    try {
      return new FileSink(path, await open(path, 'w'));
    } catch (error: unknown) {
      throw new IOError(`Cannot open ${path} for writing: ${describeCause(error)}`, { path, cause: error });
    }
  }

  async write(chunk: string): Promise<void> {
    if (!this.handle) {
      throw new IOError(`Cannot write to ${this.path}: already closed`, { path: this.path });
    }
    try {
      await this.handle.writeFile(chunk, 'utf-8');
    } catch (error: unknown) {
      throw new IOError(`Failed to write to ${this.path}: ${describeCause(error)}`, { path: this.path, cause: error });
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      await handle.close();
    } catch (error: unknown) {
      throw new IOError(`Failed to close ${this.path}: ${describeCause(error)}`, { path: this.path, cause: error });
    }
  }
}

export async function openSink(target: SinkTarget, stdout: Writable): Promise<Sink> {
  if (target.kind === 'file') {
    return FileSink.open(target.path);
  }
  return new StreamSink(stdout);
}
