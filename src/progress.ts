/**
 * Progress bar for the file-processing loop
 */

export interface ProgressOptions {
  total: number;
  label?: string;
  // Disabled trackers count but never draw (non-TTY output, tests).
  enabled?: boolean;
  stream?: NodeJS.WritableStream;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  isComplete: boolean;
}

export class ProgressTracker {
  private current = 0;
  private readonly total: number;
  private readonly label: string;
  private readonly enabled: boolean;
  private readonly stream: NodeJS.WritableStream;
  private readonly startTime = Date.now();
  private lastUpdate = 0;
  private readonly updateIntervalMs = 100;

  constructor(options: ProgressOptions) {
    this.total = options.total;
    this.label = options.label ?? 'Progress';
    this.enabled = options.enabled ?? true;
    this.stream = options.stream ?? process.stdout;
  }

  increment(amount: number = 1): void {
    this.current = Math.min(this.current + amount, this.total);
    this.updateDisplay();
  }

  complete(): void {
    this.current = this.total;
    this.updateDisplay();
    if (this.enabled) this.stream.write('\n');
  }

  getStats(): ProgressStats {
    return {
      current: this.current,
      total: this.total,
      percent: this.total === 0 ? 100 : (this.current / this.total) * 100,
      elapsed: Math.round((Date.now() - this.startTime) / 1000),
      isComplete: this.current >= this.total,
    };
  }

  render(width: number = 20): string {
    const stats = this.getStats();
    const filled = Math.round((stats.percent / 100) * width);
    const bar = '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
    return `${this.label}: ${bar} ${stats.current}/${stats.total} ${Math.round(stats.percent)}% ${stats.elapsed}s`;
  }

  private updateDisplay(): void {
    if (!this.enabled) return;
    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;
    this.stream.write('\r\x1b[K' + this.render());
  }
}
