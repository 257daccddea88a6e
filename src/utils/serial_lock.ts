/**
 * Runs async critical sections one at a time, in call order. A failing
 * section rejects its own caller only; later sections still run.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(section: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(section);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  get queued(): number {
    return this.pending;
  }

  idle(): Promise<void> {
    return this.tail;
  }

  private release(): void {
    this.pending -= 1;
  }
}
