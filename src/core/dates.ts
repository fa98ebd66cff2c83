import { ValidationError } from "./errors";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Validates a `YYYY-MM-DD` calendar date and returns it unchanged. */
export function parseIsoDate(value: string): string {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`expected a date as YYYY-MM-DD, got '${value}'`);
  }

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (candidate.getUTCFullYear() !== year || candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) {
    throw new ValidationError(`'${value}' is not a calendar date`);
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

/** `2025-07-24` -> `07/24/2025` */
export function toDocketDate(isoDate: string): string {
  const [year, month, day] = parseIsoDate(isoDate).split("-");
  return `${month}/${day}/${year}`;
}

/** `2025-07-24` -> `20250724` */
export function toCompactDate(isoDate: string): string {
  return parseIsoDate(isoDate).replace(/-/g, "");
}

function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** The weekday before `now`, skipping Saturday and Sunday. Holidays are not considered. */
export function previousBusinessDay(now: Date = new Date()): string {
  const day = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  while (day.getDay() === 0 || day.getDay() === 6) {
    day.setDate(day.getDate() - 1);
  }
  return formatLocalDate(day);
}
