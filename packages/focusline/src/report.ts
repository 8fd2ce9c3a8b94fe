import chalk from 'chalk';
import { log, sendDesktopNotification, ringBell } from '@focusline/core';
import type { CheckResult, EscalationSignal } from '@focusline/core';
import { colorVerdict } from './format';

export function escalationMessage(signal: EscalationSignal): string {
  const what = signal.verdict === 'Distracted' ? 'distracted' : 'idle';
  return `🚨 ${signal.consecutive} ${what} checks in a row. Time to refocus!`;
}

export function formatCheckResult(result: CheckResult, at: Date = new Date()): string {
  const time = chalk.dim(at.toTimeString().slice(0, 8));
  const body = result.verdict ? colorVerdict(result.verdict, `[${result.verdict}] ${result.message}`) : chalk.yellow(result.message);
  return `${time} ${body}`;
}

export function printCheckResult(result: CheckResult) {
  console.log(formatCheckResult(result));
  if (result.escalation) console.log(chalk.red.bold(escalationMessage(result.escalation)));
}

/** Desktop notification for non-On-Track verdicts; escalations also ring the terminal bell. */
export function notifyCheckResult(result: CheckResult) {
  if (!result.alert) return;
  const body = result.escalation ? `${escalationMessage(result.escalation)} ${result.alert.message}` : result.alert.message;
  if (!sendDesktopNotification(result.alert.title, body, Boolean(result.escalation))) {
    log.dim('  (desktop notification unavailable)');
  }
  if (result.escalation) ringBell();
}
