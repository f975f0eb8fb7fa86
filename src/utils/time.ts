// Path: src/utils/time.ts
// Timestamp formatting for note metadata fields

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date in local time as `YYYY/MM/DD HH:mm:ss`.
 *
 * @example
 * formatTimestamp(new Date(2024, 0, 5, 9, 3, 7)); // '2024/01/05 09:03:07'
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
