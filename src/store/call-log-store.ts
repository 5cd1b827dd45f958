import { z } from 'zod';
import { CallLogEntry } from '../types';

const callLogEntrySchema = z.object({
  number: z.string(),
  status: z.enum(['completed-initiated', 'failed']),
  timestamp: z.string(),
  sid: z.string().optional(),
  error: z.string().optional(),
});

export const callLogSchema = z.array(callLogEntrySchema);

/**
 * Ordered, append-only call history. Entries come back oldest first.
 * `rewrite` replaces the whole history in one step and returns how many
 * entries were written.
 */
export interface CallLogStore {
  list(): Promise<CallLogEntry[]>;
  append(entry: CallLogEntry): Promise<void>;
  rewrite(transform: (entries: CallLogEntry[]) => CallLogEntry[]): Promise<number>;
  close(): Promise<void>;
}

/**
 * Serializes async operations: each call waits for the previous one to
 * settle before running.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  drain(): Promise<void> {
    return this.tail;
  }
}
