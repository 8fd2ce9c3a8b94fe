function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date, YYYY-MM-DD. */
export function dayKey(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local calendar date `days` before `d`. */
export function daysBefore(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() - days);
}

export function shortDate(d: Date): string {
  return `${pad(d.getMonth() + 1)}/${pad(d.getDate())}`;
}
