import { promises as fs } from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { CallLogEntry } from '../types';
import { PersistenceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CallLogStore, OperationQueue, callLogSchema } from './call-log-store';

const log = logger.child('call-log');

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Call log kept as a pretty-printed JSON array on disk. Every operation
 * reads and writes the whole document; the queue keeps concurrent
 * requests from interleaving, and writes land through a rename.
 */
export class JsonFileCallLogStore implements CallLogStore {
  private readonly queue = new OperationQueue();
  private closed = false;

  private constructor(readonly filePath: string) {}

  static async open(filePath: string): Promise<JsonFileCallLogStore> {
    const store = new JsonFileCallLogStore(filePath);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    } catch (err) {
      throw new PersistenceError(`Cannot create call log directory for ${filePath}`, err);
    }
    const entries = await store.read();
    log.info('Call log opened', { path: filePath, entries: entries.length });
    return store;
  }

  list(): Promise<CallLogEntry[]> {
    return this.enqueue(() => this.read());
  }

  append(entry: CallLogEntry): Promise<void> {
    return this.enqueue(async () => {
      const entries = await this.read();
      entries.push(entry);
      await this.write(entries);
    });
  }

  rewrite(transform: (entries: CallLogEntry[]) => CallLogEntry[]): Promise<number> {
    return this.enqueue(async () => {
      const entries = transform(await this.read());
      await this.write(entries);
      return entries.length;
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.queue.drain();
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new PersistenceError('Call log store is closed'));
    }
    return this.queue.run(fn);
  }

  private async read(): Promise<CallLogEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new PersistenceError(`Cannot read call log ${this.filePath}`, err);
    }

    if (raw.trim() === '') return [];

    try {
      return callLogSchema.parse(JSON.parse(raw));
    } catch (err) {
      const detail = err instanceof ZodError ? 'unexpected record shape' : 'invalid JSON';
      throw new PersistenceError(`Call log ${this.filePath} is corrupt (${detail})`, err);
    }
  }

  private async write(entries: CallLogEntry[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, `${JSON.stringify(entries, null, 2)}\n`, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new PersistenceError(`Cannot write call log ${this.filePath}`, err);
    }
  }
}
