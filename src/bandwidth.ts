/**
 * Throughput indicator: collects bytes/ms samples and publishes the median
 * of every full window, which ignores the bursts and stalls that
 * bufferedAmount-driven sending produces.
 */

export const WINDOW_SIZE = 16;

export class BandwidthMeter {
  private samples: number[] = [];
  private _median: number | null = null;

  constructor(private readonly onUpdate?: (bytesPerMs: number) => void) {}

  /** Last published median in bytes per millisecond, null before the first window. */
  get median(): number | null {
    return this._median;
  }

  addSample(elapsedMs: number, bytes: number): void {
    if (elapsedMs <= 0) return;
    this.samples.push(bytes / elapsedMs);
    if (this.samples.length < WINDOW_SIZE) return;

    const sorted = [...this.samples].sort((a, b) => a - b);
    this.samples = [];
    this._median = sorted[WINDOW_SIZE / 2];
    this.onUpdate?.(this._median);
  }
}

const MB_PER_BYTE_PER_MS = 1000 / (1024 * 1024);

export function formatRate(bytesPerMs: number): string {
  return `${(bytesPerMs * MB_PER_BYTE_PER_MS).toFixed(1)} MB/s`;
}
