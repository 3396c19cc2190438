// Indian market clock helpers (UTC+05:30, no daylight saving)

const LOCAL_OFFSET_MS = (5 * 60 + 30) * 60 * 1000;

/** Local exchange time as `YYYY-MM-DDTHH:mm:ss` */
export function toLocalTimestamp(date: Date): string {
  return new Date(date.getTime() + LOCAL_OFFSET_MS).toISOString().slice(0, 19);
}

/** Local exchange date as `YYYY-MM-DD` */
export function localDate(date: Date = new Date()): string {
  return toLocalTimestamp(date).slice(0, 10);
}
