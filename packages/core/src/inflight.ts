/**
 * Tracks which (account, kind) pairs have a pass in flight. Acquisition never
 * waits: a busy key is reported so the caller can skip the pass.
 */
export class InFlightRegistry {
  private readonly active = new Set<string>();

  static keyFor(account: string, kind: string): string {
    return `${account}:${kind}`;
  }

  /**
   * @returns a release function, or null when the key is already taken
   */
  tryAcquire(key: string): (() => void) | null {
    if (this.active.has(key)) {
      return null;
    }
    this.active.add(key);
    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.active.delete(key);
      }
    };
  }

  isActive(key: string): boolean {
    return this.active.has(key);
  }
}
