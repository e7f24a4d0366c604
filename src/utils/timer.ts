/**
 * Monotonic stopwatch. Elapsed time comes from `performance.now()`;
 * wall-clock timestamps are for display only.
 */
export class Stopwatch {
  private readonly startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Stop the stopwatch and return total elapsed seconds
   */
  stop(): number {
    this.endTime = performance.now();
    return this.elapsedSeconds;
  }

  get elapsedSeconds(): number {
    const end = this.endTime ?? performance.now();
    return (end - this.startTime) / 1000;
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local wall-clock time at second precision, `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Seconds with three decimals, as shown in log lines.
 */
export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}
