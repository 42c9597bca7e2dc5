/**
 * Wall-clock timer with named laps, used for stage and run durations
 */
export class Timer {
  private readonly startedAt = performance.now();
  private stoppedAt?: number;
  private readonly laps = new Map<string, number>();

  /** Milliseconds since start, remembered under `label` */
  lap(label: string): number {
    const at = performance.now() - this.startedAt;
    this.laps.set(label, at);
    return at;
  }

  stop(): number {
    this.stoppedAt ??= performance.now();
    return this.elapsed;
  }

  get elapsed(): number {
    return (this.stoppedAt ?? performance.now()) - this.startedAt;
  }

  getLaps(): Record<string, number> {
    return Object.fromEntries(this.laps);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}
