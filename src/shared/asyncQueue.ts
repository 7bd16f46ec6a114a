/**
 * File FIFO poussée par callbacks et consommée via `for await`.
 * Après `end()`, les éléments déjà en file sont livrés puis l'itération se termine.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly takers: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;

  push(item: T): void {
    if (this.ended) return;
    const taker = this.takers.shift();
    if (taker) taker({ value: item, done: false });
    else this.items.push({ value: item });
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const taker of this.takers.splice(0)) taker({ value: undefined, done: true });
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get length(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T>> {
    const head = this.items.shift();
    if (head) return Promise.resolve({ value: head.value, done: false });
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.takers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
