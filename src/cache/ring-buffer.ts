/**
 * Fixed-capacity ring buffers, one per chat. Appending to a full buffer
 * overwrites the oldest entry.
 */

export class RingBuffer<T> {
  readonly capacity: number;
  private readonly items: (T | undefined)[];
  private start = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    if (this.count < this.capacity) {
      this.items[(this.start + this.count) % this.capacity] = item;
      this.count++;
      return;
    }
    // Full: the slot at `start` holds the oldest entry.
    this.items[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  /** Oldest-first copy; callers can't mutate internal storage. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.items.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}

export class ChatBuffers<T> {
  private readonly buffers = new Map<number, RingBuffer<T>>();
  readonly capacity: number;

  constructor(capacity: number) {
    // Throws here on a bad capacity, before any chat exists.
    this.capacity = new RingBuffer<T>(capacity).capacity;
  }

  getOrCreate(chatId: number): RingBuffer<T> {
    let buffer = this.buffers.get(chatId);
    if (!buffer) {
      buffer = new RingBuffer<T>(this.capacity);
      this.buffers.set(chatId, buffer);
    }
    return buffer;
  }

  snapshot(chatId: number): T[] {
    return this.buffers.get(chatId)?.toArray() ?? [];
  }

  delete(chatId: number): void {
    this.buffers.delete(chatId);
  }

  chatIds(): number[] {
    return Array.from(this.buffers.keys());
  }
}
