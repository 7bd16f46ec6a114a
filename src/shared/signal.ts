/**
 * Signal à une place: `set()` répété tant que le signal n'a pas été consommé
 * ne s'accumule pas. Le consommateur attend avec `wait()` puis réarme avec `clear()`.
 */
export class Signal {
  private flag = false;
  private waiters: Array<() => void> = [];

  set(): void {
    if (this.flag) return;
    this.flag = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  clear(): void {
    this.flag = false;
  }

  isSet(): boolean {
    return this.flag;
  }

  wait(): Promise<void> {
    if (this.flag) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
