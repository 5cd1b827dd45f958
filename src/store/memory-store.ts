import { CallLogEntry } from '../types';
import { CallLogStore, OperationQueue } from './call-log-store';

export class InMemoryCallLogStore implements CallLogStore {
  private entries: CallLogEntry[];
  private readonly queue = new OperationQueue();

  constructor(initial: CallLogEntry[] = []) {
    this.entries = initial.map((e) => ({ ...e }));
  }

  list(): Promise<CallLogEntry[]> {
    return this.queue.run(async () => this.entries.map((e) => ({ ...e })));
  }

  append(entry: CallLogEntry): Promise<void> {
    return this.queue.run(async () => {
      this.entries.push({ ...entry });
    });
  }

  rewrite(transform: (entries: CallLogEntry[]) => CallLogEntry[]): Promise<number> {
    return this.queue.run(async () => {
      this.entries = transform(this.entries.map((e) => ({ ...e })));
      return this.entries.length;
    });
  }

  close(): Promise<void> {
    return this.queue.drain();
  }
}
