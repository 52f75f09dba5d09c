/**
 * Single-slot availability gate: at most one holder at a time, waiters
 * admitted in arrival order.
 */

export type Release = () => void;

export class AvailabilityGate {
  private held = false;
  private readonly queue: Array<() => void> = [];

  get busy(): boolean {
    return this.held;
  }

  async acquire(): Promise<Release> {
    if (this.held) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    this.held = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; held stays true
      next();
    } else {
      this.held = false;
    }
  }
}
