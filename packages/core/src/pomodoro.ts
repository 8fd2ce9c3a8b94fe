export const WORK_SECONDS = 25 * 60;
export const BREAK_SECONDS = 5 * 60;

export interface TickResult {
  display: string;
  shouldPlaySound: boolean;
}

export function formatTime(totalSeconds: number): string {
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

/** Work/break countdown. Reaching zero flips the phase and pauses until started again. */
export class PomodoroTimer {
  remainingSeconds = WORK_SECONDS;
  isRunning = false;
  isWorkPhase = true;

  get display(): string {
    return formatTime(this.remainingSeconds);
  }

  statusLine(): string {
    const phase = this.isWorkPhase ? 'Work Time ⏰' : 'Break Time ☕';
    return `${this.display} ${phase}${this.isRunning ? ' (Running)' : ''}`;
  }

  start(): void {
    this.isRunning = true;
  }

  pause(): void {
    this.isRunning = false;
  }

  reset(): void {
    this.isRunning = false;
    this.isWorkPhase = true;
    this.remainingSeconds = WORK_SECONDS;
  }

  tick(): TickResult {
    if (!this.isRunning) return { display: this.display, shouldPlaySound: false };

    this.remainingSeconds -= 1;
    if (this.remainingSeconds > 0) return { display: this.display, shouldPlaySound: false };

    this.isWorkPhase = !this.isWorkPhase;
    this.remainingSeconds = this.isWorkPhase ? WORK_SECONDS : BREAK_SECONDS;
    this.isRunning = false;
    return { display: this.display, shouldPlaySound: true };
  }
}
