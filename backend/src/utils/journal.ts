/** Undo journal for a multi-step in-memory commit: every applied step registers its inverse. */

export class Journal {
  private undos: Array<() => void> = [];

  /** Apply a step and remember how to reverse it. */
  apply<T>(step: () => T, undo: (result: T) => void): T {
    const result = step();
    this.undos.push(() => undo(result));
    return result;
  }

  get length(): number {
    return this.undos.length;
  }

  /**
   * Reverse all applied steps, newest first. Returns the errors raised by undo
   * steps; the remaining steps still run when one fails.
   */
  rollback(): Error[] {
    const failures: Error[] = [];
    while (this.undos.length > 0) {
      const undo = this.undos.pop();
      if (!undo) break;
      try {
        undo();
      } catch (err) {
        failures.push(err instanceof Error ? err : new Error(String(err)));
      }
    }
    return failures;
  }
}
