const CREDIT_DATE_PATTERN = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/;

const MONTHS: Record<string, number> = {
  ene: 1,
  jan: 1,
  feb: 2,
  mar: 3,
  abr: 4,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  ago: 8,
  aug: 8,
  sep: 9,
  set: 9,
  oct: 10,
  nov: 11,
  dic: 12,
  dec: 12,
};

/**
 * Month number for a three-letter Spanish or English abbreviation, or null.
 */
export function monthAbbreviationToNumber(abbreviation: string): number | null {
  return MONTHS[abbreviation.toLowerCase()] ?? null;
}

/**
 * Convert a credit statement date token (`DD-Mon-YYYY`) to `YYYY-MM-DD`.
 * Returns null for tokens that do not name a real calendar day.
 */
export function parseCreditDate(token: string): string | null {
  const match = CREDIT_DATE_PATTERN.exec(token.trim());
  if (match === null) {
    return null;
  }

  const [, day, monthName, year] = match;
  if (day === undefined || monthName === undefined || year === undefined) {
    return null;
  }

  const month = monthAbbreviationToNumber(monthName);
  if (month === null) {
    return null;
  }

  const dayNum = parseInt(day, 10);
  const yearNum = parseInt(year, 10);
  const date = new Date(Date.UTC(yearNum, month - 1, dayNum));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== dayNum) {
    return null;
  }

  return `${year}-${month.toString().padStart(2, '0')}-${day}`;
}
