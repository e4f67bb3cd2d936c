export interface ProgressSnapshot {
  receivedBytes: number;
  totalBytes?: number | undefined;
  elapsedSeconds: number;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = units[0];
  for (let i = 1; i < units.length && value >= 1024; i++) {
    value /= 1024;
    unit = units[i];
  }
  return `${value.toFixed(2)}${unit}`;
}

/**
 * One progress line, e.g.
 * `[50.00%] 1.00MB / 2.00MB  2.0s/4.0s  512.00KB/s  2.0s eta`.
 * Without a known total only the received bytes and rate are shown.
 */
export function formatProgress({ receivedBytes, totalBytes, elapsedSeconds }: ProgressSnapshot): string {
  const rate = elapsedSeconds > 0 ? receivedBytes / elapsedSeconds : 0;
  const rateText = `${formatBytes(Math.round(rate))}/s`;
  if (!totalBytes) {
    return `${formatBytes(receivedBytes)}  ${elapsedSeconds.toFixed(1)}s  ${rateText}`;
  }
  const percent = (receivedBytes / totalBytes) * 100;
  const estimatedTotal = rate > 0 ? totalBytes / rate : 0;
  const eta = rate > 0 ? (totalBytes - receivedBytes) / rate : 0;
  return `[${percent.toFixed(2)}%] ${formatBytes(receivedBytes)} / ${formatBytes(totalBytes)}` +
    `  ${elapsedSeconds.toFixed(1)}s/${estimatedTotal.toFixed(1)}s  ${rateText}  ${eta.toFixed(1)}s eta`;
}

export interface ProgressReporter {
  start(label: string, totalBytes?: number): void;
  update(receivedBytes: number): void;
  finish(): void;
}

export interface ProgressStream {
  write(chunk: string): boolean;
  isTTY?: boolean | undefined;
}

/**
 * Rewrites a single line in place on a terminal; elsewhere prints only the
 * final line of each download.
 */
export class ConsoleProgress implements ProgressReporter {
  private label = '';
  private totalBytes: number | undefined;
  private receivedBytes = 0;
  private startTime = 0;
  private lastRender = 0;
  private readonly throttleMs = 200;

  constructor(
    private readonly stream: ProgressStream = process.stdout,
    private readonly now: () => number = Date.now
  ) {}

  start(label: string, totalBytes?: number): void {
    this.label = label;
    this.totalBytes = totalBytes;
    this.receivedBytes = 0;
    this.startTime = this.now();
    this.lastRender = 0;
  }

  update(receivedBytes: number): void {
    this.receivedBytes = receivedBytes;
    const now = this.now();
    if (this.stream.isTTY && now - this.lastRender >= this.throttleMs) {
      this.lastRender = now;
      this.stream.write(`\r\x1b[K${this.render(now)}`);
    }
  }

  finish(): void {
    const line = this.render(this.now());
    this.stream.write(this.stream.isTTY ? `\r\x1b[K${line}\n` : `${line}\n`);
  }

  private render(now: number): string {
    const snapshot: ProgressSnapshot = {
      receivedBytes: this.receivedBytes,
      totalBytes: this.totalBytes,
      elapsedSeconds: (now - this.startTime) / 1000,
    };
    return `${this.label} ${formatProgress(snapshot)}`;
  }
}
