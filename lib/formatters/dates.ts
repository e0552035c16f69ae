/**
 * Long-form publish dates ("March 5, 2024") as they appear in archives
 */

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export const MONTH_PATTERN = MONTH_NAMES.join('|');

/** Exactly a long-form date such as "March 5, 2024" */
export const LONG_FORM_DATE = new RegExp(`^(?:${MONTH_PATTERN}) \\d{1,2}, \\d{4}$`);

const LOOSE_LONG_FORM = new RegExp(`^(${MONTH_PATTERN}) (\\d{1,2}),? (\\d{4})$`);
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/;

function utcDate(year: number, monthIndex: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Reformat a machine-readable date (YYYY-MM-DD, optionally followed by a
 * time part) as "March 5, 2024". Returns undefined when it does not parse.
 */
export function formatLongDate(machineDate: string): string | undefined {
  const match = ISO_DATE.exec(machineDate.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  const day = Number(match[3]);
  if (!utcDate(year, monthIndex, day)) return undefined;

  return `${MONTH_NAMES[monthIndex]} ${day}, ${year}`;
}

/**
 * Parse "January 5, 2024", "January 05 2024" or "2024-01-05" to UTC midnight
 */
export function parseArchiveDate(text: string): Date | null {
  const trimmed = text.trim();

  const longForm = LOOSE_LONG_FORM.exec(trimmed);
  if (longForm) {
    const monthIndex = MONTH_NAMES.findIndex(name => name === longForm[1]);
    return utcDate(Number(longForm[3]), monthIndex, Number(longForm[2]));
  }

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    return utcDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
  }

  return null;
}
