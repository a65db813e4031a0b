/**
 * Promise-chain mutual exclusion. Each task starts after the previous one settles,
 * whether it resolved or rejected.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
