import { errorMessage } from './errors';
import { log } from './output';
import type { CheckRequest, CheckResult, FocusMonitor } from './monitor';

type ResultHandler = (result: CheckResult) => void;

/**
 * Periodic trigger for FocusMonitor.runCheck with a single-flight guard:
 * a tick that fires while a check is still running is skipped, and manual
 * runs join the in-flight check instead of starting a second one. A run
 * carrying its own text waits for the in-flight check and then runs.
 */
export class FocusScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<CheckResult> | null = null;
  private handlers: ResultHandler[] = [];
  skippedTicks = 0;

  constructor(private monitor: FocusMonitor, private intervalSeconds = 30) {}

  get interval(): number {
    return this.intervalSeconds;
  }

  onResult(handler: ResultHandler): void {
    this.handlers.push(handler);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => { void this.tick(); }, this.intervalSeconds * 1000);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  setIntervalSeconds(seconds: number): void {
    this.intervalSeconds = seconds;
    if (this.timer) {
      this.stop();
      this.start();
    }
  }

  runNow(request: CheckRequest = {}): Promise<CheckResult> {
    if (this.inFlight) {
      if (request.text === undefined) return this.inFlight;
      return this.inFlight.then(() => this.runNow(request));
    }
    const run = this.monitor.runCheck(request).then((result) => {
      this.emit(result);
      return result;
    }).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  async tick(): Promise<void> {
    if (this.inFlight) {
      this.skippedTicks++;
      return;
    }
    await this.runNow();
  }

  private emit(result: CheckResult) {
    for (const h of this.handlers) {
      try {
        h(result);
      } catch (err) {
        log.warn(`Check result handler failed: ${errorMessage(err)}`);
      }
    }
  }
}
