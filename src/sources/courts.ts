const COURT_SEATS = [
  "Houston",
  "Fort Worth",
  "Austin",
  "San Antonio",
  "Dallas",
  "Texarkana",
  "Amarillo",
  "El Paso",
  "Beaumont",
  "Waco",
  "Eastland",
  "Tyler",
  "Corpus Christi-Edinburg",
  "Houston",
] as const;

function toSourceId(courtNumber: number): string {
  return `coa${String(courtNumber).padStart(2, "0")}`;
}

export const ALL_SOURCE_IDS: readonly string[] = COURT_SEATS.map((_, index) => toSourceId(index + 1));

/** `coa05` -> 5, or undefined for ids outside the fourteen intermediate courts. */
export function courtNumber(sourceId: string): number | undefined {
  const match = /^coa(\d{2})$/i.exec(sourceId.trim());
  if (!match) {
    return undefined;
  }
  const value = Number.parseInt(match[1], 10);
  return value >= 1 && value <= COURT_SEATS.length ? value : undefined;
}

export function courtName(sourceId: string): string {
  const value = courtNumber(sourceId);
  if (value === undefined) {
    return sourceId;
  }
  return `${ordinal(value)} Court of Appeals (${COURT_SEATS[value - 1]})`;
}

function ordinal(value: number): string {
  const lastTwo = value % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${value}th`;
  }
  switch (value % 10) {
    case 1:
      return `${value}st`;
    case 2:
      return `${value}nd`;
    case 3:
      return `${value}rd`;
    default:
      return `${value}th`;
  }
}
