import { IOutputStream } from '../interfaces/IOutputStream';
import { ChannelClosedError } from '../errors';

interface PendingWrite<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type PendingRead<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Multi-producer, single-consumer channel with optional capacity.
 *
 * With a finite capacity, writes beyond it wait until the consumer makes
 * room; capacity 0 hands every value straight to a waiting reader. Values
 * buffered before {@link close} are still delivered; reads after that
 * report done.
 */
export class AsyncChannel<T> implements IOutputStream<T>, AsyncIterable<T> {
  // boxed so that undefined is a valid value
  private buffer: Array<{ value: T }> = [];
  private pendingWrites: PendingWrite<T>[] = [];
  private pendingReads: PendingRead<T>[] = [];
  private isClosed = false;

  constructor(private readonly capacity: number = Infinity) {
    if (capacity < 0 || Number.isNaN(capacity)) {
      throw new RangeError(`Channel capacity must be non-negative, got ${capacity}`);
    }
  }

  write(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError('Cannot write to a closed channel'));
    }

    const reader = this.pendingReads.shift();
    if (reader) {
      reader({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.pendingWrites.push({ value, resolve, reject });
    });
  }

  read(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      const writer = this.pendingWrites.shift();
      if (writer) {
        this.buffer.push({ value: writer.value });
        writer.resolve();
      }
      return Promise.resolve({ value: buffered.value, done: false });
    }

    const writer = this.pendingWrites.shift();
    if (writer) {
      writer.resolve();
      return Promise.resolve({ value: writer.value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.pendingReads.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) {
      throw new ChannelClosedError('Channel already closed');
    }
    this.isClosed = true;

    for (const reader of this.pendingReads.splice(0)) {
      reader({ value: undefined, done: true });
    }
    for (const writer of this.pendingWrites.splice(0)) {
      writer.reject(new ChannelClosedError('Channel closed before the value was read'));
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Number of values buffered and not yet read
   */
  get size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.read();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}
