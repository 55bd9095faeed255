const ARCHIVE_PREFIX = "weather-data";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYYMMDD-HHMMSS`. */
export function formatArchiveTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function archiveObjectKey(city: string, timestamp: string): string {
  return `${ARCHIVE_PREFIX}/${city}-${timestamp}.json`;
}
