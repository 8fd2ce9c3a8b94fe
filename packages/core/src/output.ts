import chalk from 'chalk';

let jsonMode = false;
let quiet = false;

export function setJsonMode(v: boolean) { jsonMode = v; }
export function isJsonMode() { return jsonMode; }

// Silences info/warn output (tests, server request handlers).
export function setQuiet(v: boolean) { quiet = v; }

export function out(data: unknown) {
  if (jsonMode) {
    console.log(JSON.stringify(data, null, 2));
  }
}

export const log = {
  info(msg: string) {
    if (quiet || jsonMode) return;
    console.log(msg);
  },
  success(msg: string) {
    if (quiet || jsonMode) return;
    console.log(chalk.green(`✓ ${msg}`));
  },
  warn(msg: string) {
    if (quiet) return;
    console.error(chalk.yellow(`⚠️  ${msg}`));
  },
  error(msg: string) {
    console.error(chalk.red(`✗ ${msg}`));
  },
  dim(msg: string) {
    if (quiet || jsonMode) return;
    console.log(chalk.dim(msg));
  },
};
