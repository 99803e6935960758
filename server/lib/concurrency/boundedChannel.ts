/**
 * 有界异步通道（drop-oldest 背压）
 *
 * push() 永不阻塞：缓冲区满时丢弃最旧的元素并计数，
 * 消费端通过 for await 或 next() 拉取。
 */

export interface BoundedChannelOptions<T> {
  capacity: number;
  /** 元素因溢出被丢弃时回调 */
  onDrop?: (item: T) => void;
  /** 通道关闭时回调（消费者 break / return / close） */
  onClose?: () => void;
}

export class BoundedChannel<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly pending: Array<(result: IteratorResult<T>) => void> = [];
  private readonly capacity: number;
  private readonly onDrop?: (item: T) => void;
  private readonly onClose?: () => void;
  private closed = false;
  private droppedCount = 0;

  constructor(options: BoundedChannelOptions<T>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.onDrop = options.onDrop;
    this.onClose = options.onClose;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** 写入元素；通道已关闭返回 false */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.pending.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      const oldest = this.buffer.shift();
      this.droppedCount++;
      if (oldest !== undefined && this.onDrop) this.onDrop(oldest);
    }
    return true;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => this.pending.push(resolve));
  }

  /** for await 中 break 时调用：丢弃未消费的缓冲并关闭 */
  return(): Promise<IteratorResult<T>> {
    this.buffer.length = 0;
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  /** 关闭通道：不再接受写入，已缓冲的元素仍可读出 */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.pending.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onClose?.();
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
