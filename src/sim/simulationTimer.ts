/** Wall-clock time a simulation session has been running, for the timer label. */
export class SimulationTimer {
  private readonly clock: () => number;
  private startedAt: number | null = null;

  constructor(clock: () => number = () => Date.now()) {
    this.clock = clock;
  }

  start(): void {
    if (this.startedAt === null) {
      this.startedAt = this.clock();
    }
  }

  stop(): void {
    this.startedAt = null;
  }

  isRunning(): boolean {
    return this.startedAt !== null;
  }

  getElapsedMillis(): number {
    if (this.startedAt === null) {
      return 0;
    }
    return Math.max(0, this.clock() - this.startedAt);
  }

  getFormattedTime(): string {
    return formatElapsed(this.getElapsedMillis());
  }
}

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}
