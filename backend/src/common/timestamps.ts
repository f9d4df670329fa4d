export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar day as `YYYY-MM-DD`. */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local time as `YYYYMMDD_HHMMSS`; sorts lexicographically in time order. */
export function formatBackupStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
