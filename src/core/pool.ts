/** Fixed-size task pool: at most `concurrency` tasks run at once, the rest wait in FIFO order. */
export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new Error("WorkerPool requires a positive integer concurrency limit");
    }
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const execute = () => {
        this.active += 1;
        task()
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.flush();
          });
      };

      if (this.active < this.concurrency) {
        execute();
      } else {
        this.queue.push(execute);
      }
    });
  }

  map<T, R>(items: readonly T[], worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item, index) => this.run(() => worker(item, index))));
  }

  private flush(): void {
    if (this.queue.length === 0) return;
    if (this.active >= this.concurrency) return;
    const next = this.queue.shift();
    if (next) next();
  }
}
