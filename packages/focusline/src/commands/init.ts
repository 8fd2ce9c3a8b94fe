import * as path from 'path';
import chalk from 'chalk';
import { configPath, initDataDir, isJsonMode, log, out } from '@focusline/core';
import { getDataDir } from '../session';

export async function initCommand() {
  const dir = getDataDir();
  const created = initDataDir(dir);
  const rel = path.relative(process.cwd(), dir) || dir;

  if (isJsonMode()) return out({ success: created, path: dir, ...(created ? {} : { error: 'Already initialized' }) });
  if (!created) {
    console.log(chalk.yellow(`Already initialized in ${rel}/`));
    return;
  }
  log.success(`Initialized ${rel}/`);
  log.dim(`  Edit ${path.relative(process.cwd(), configPath(dir))} to pick a provider and tune the monitor`);
}
