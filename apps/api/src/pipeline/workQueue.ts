export class QueueClosedError extends Error {
  constructor(message = "work_queue_closed") {
    super(message);
    this.name = "QueueClosedError";
  }
}

type BlockedProducer<T> = {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * Bounded FIFO buffer between submission and the worker.
 *
 * `enqueue` suspends while the buffer is full; blocked producers are
 * admitted in the order they arrived as the consumer drains slots.
 * `dequeue` suspends while the buffer is empty and resolves `null` once
 * the queue is closed and drained.
 */
export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly items: Array<{ value: T }> = [];
  private readonly producers: BlockedProducer<T>[] = [];
  private readonly consumers: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError("queue capacity must be a positive integer");
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get blockedProducers(): number {
    return this.producers.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push({ value: item });
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.producers.push({ item, resolve, reject });
    });
  }

  dequeue(): Promise<T | null> {
    const head = this.items.shift();
    if (head) {
      this.admitProducer();
      return Promise.resolve(head.value);
    }
    if (this.closed) return Promise.resolve(null);
    return new Promise<T | null>((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /** Rejects blocked producers; items already buffered are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const producer of this.producers.splice(0)) {
      producer.reject(new QueueClosedError());
    }
    for (const consumer of this.consumers.splice(0)) {
      consumer(null);
    }
  }

  private admitProducer(): void {
    const producer = this.producers.shift();
    if (!producer) return;
    this.items.push({ value: producer.item });
    producer.resolve();
  }
}
