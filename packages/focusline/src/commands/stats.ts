import { isJsonMode, out } from '@focusline/core';
import { openSession } from '../session';
import { formatStats } from '../format';

export async function statsCommand() {
  const ctx = openSession();
  const today = await ctx.metrics.todayStats();
  const currentStreak = await ctx.metrics.currentStreak();

  if (isJsonMode()) return out({ ...today, currentStreak });
  console.log(formatStats(today, currentStreak));
}
