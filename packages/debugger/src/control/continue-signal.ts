/**
 * Single-slot, level-set gate for the paused worker.
 *
 * `set()` releases every pending `wait()` and keeps the gate open, so a
 * later `wait()` resolves at once; `clear()` closes it again. Setting an
 * open gate is a no-op.
 */
export class ContinueSignal {
  private open: boolean;
  private readonly waiters = new Set<() => void>();

  public constructor(initiallySet = true) {
    this.open = initiallySet;
  }

  public set(): void {
    if (this.open) {
      return;
    }
    this.open = true;
    const pending = Array.from(this.waiters);
    this.waiters.clear();
    for (const release of pending) {
      release();
    }
  }

  public clear(): void {
    this.open = false;
  }

  public isSet(): boolean {
    return this.open;
  }

  /** Number of callers currently suspended in {@link ContinueSignal.wait} */
  public get waiting(): number {
    return this.waiters.size;
  }

  /**
   * Resolves once the gate is open.
   * @param timeoutMs - Give up after this long; waits indefinitely when omitted
   * @returns true when released by `set()`, false on timeout
   */
  public wait(timeoutMs?: number): Promise<boolean> {
    if (this.open) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const release = () => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(true);
      };
      this.waiters.add(release);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters.delete(release);
          resolve(false);
        }, timeoutMs);
      }
    });
  }
}
