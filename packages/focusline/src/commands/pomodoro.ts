import chalk from 'chalk';
import { PomodoroTimer, log, ringBell, sendDesktopNotification } from '@focusline/core';

/** Runs one work session and the break after it, redrawing a single status line. */
export async function pomodoroCommand(opts: { notify: boolean }) {
  const timer = new PomodoroTimer();
  timer.start();
  log.info(chalk.bold('🍅 Pomodoro started. Ctrl+C to stop.'));

  await new Promise<void>((resolve) => {
    const interval = setInterval(() => {
      const { shouldPlaySound } = timer.tick();
      process.stdout.write(`\r${timer.statusLine()}    `);
      if (!shouldPlaySound) return;

      ringBell();
      const message = timer.isWorkPhase ? 'Break is over. Back to it!' : 'Work session done. Take a break ☕';
      if (opts.notify) sendDesktopNotification('Pomodoro 🍅', message);
      if (!timer.isWorkPhase) {
        process.stdout.write(`\n${message}\n`);
        timer.start();
        return;
      }
      finish();
    }, 1000);

    function finish() {
      clearInterval(interval);
      process.removeListener('SIGINT', finish);
      process.stdout.write('\n');
      resolve();
    }
    process.once('SIGINT', finish);
  });
}
