const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (n: number) => String(n).padStart(2, '0');

function startOfDay(d: Date): number {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate()).getTime();
}

/**
 * Human-readable prayer time relative to `now`, in the server's local time:
 * "today at 14:30", "yesterday at 09:15" or "on 15 Jan 2023 at 10:00".
 */
export function formatPrettyTimestamp(value: string | Date | null | undefined, now: Date = new Date()): string {
  if (!value) return 'N/A';
  const timestamp = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(timestamp.getTime())) return 'Invalid date';

  const deltaDays = Math.round((startOfDay(now) - startOfDay(timestamp)) / 86_400_000);
  const time = pad(timestamp.getHours()) + ':' + pad(timestamp.getMinutes());

  if (deltaDays === 0) return 'today at ' + time;
  if (deltaDays === 1) return 'yesterday at ' + time;
  const date = pad(timestamp.getDate()) + ' ' + MONTHS[timestamp.getMonth()] + ' ' + timestamp.getFullYear();
  return 'on ' + date + ' at ' + time;
}
