/*
Purpose: the single FIFO of admitted build ids, with direct hand-off to waiting workers.
Assumptions: callers own the build records; the queue only orders ids.
*/

type Taker = {
  resolve: (buildId: string) => void;
  detach: () => void;
};

export class BuildQueue {
  private readonly items: string[] = [];
  private readonly takers: Taker[] = [];

  get size(): number {
    return this.items.length;
  }

  enqueue(buildId: string): void {
    const taker = this.takers.shift();
    if (taker) {
      taker.detach();
      taker.resolve(buildId);
      return;
    }
    this.items.push(buildId);
  }

  // Resolves with the head of the queue, waiting for the next enqueue when empty.
  take(signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();

    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) this.takers.splice(index, 1);
        reject(signal?.reason);
      };
      const taker: Taker = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.takers.push(taker);
    });
  }

  remove(buildId: string): boolean {
    const index = this.items.indexOf(buildId);
    if (index < 0) return false;
    this.items.splice(index, 1);
    return true;
  }

  snapshot(): string[] {
    return [...this.items];
  }
}
