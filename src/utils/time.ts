function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date in local time as `YYYY-MM-DD HH:mm`, or `YYYY-MM-DD HH:mm:ss`
 */
export function formatLocalDateTime(date: Date, withSeconds: boolean = false): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}
