/**
 * Session Timers
 * Named, individually cancelable timers owned by one device session
 */

export class SessionTimers {
  private timers = new Map<string, NodeJS.Timeout>();

  /**
   * Schedule a callback; replaces any pending timer with the same name
   */
  schedule(name: string, delayMs: number, callback: () => void): void {
    this.cancel(name);

    const timer = setTimeout(() => {
      this.timers.delete(name);
      callback();
    }, delayMs);

    this.timers.set(name, timer);
  }

  /**
   * @returns true if a pending timer was cancelled
   */
  cancel(name: string): boolean {
    const timer = this.timers.get(name);
    if (!timer) return false;

    clearTimeout(timer);
    this.timers.delete(name);
    return true;
  }

  has(name: string): boolean {
    return this.timers.has(name);
  }

  pending(): string[] {
    return Array.from(this.timers.keys());
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
