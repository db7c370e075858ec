/**
 * 단일 생산자 → 소비자 이벤트 채널 (async iterable)
 *
 * - 소비자가 없으면 이벤트를 버퍼에 보관
 * - close() 이후 push는 무시, 남은 버퍼를 모두 읽으면 종료
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve({ value: buffered.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => ({ value: undefined, done: true }),
    };
  }
}
