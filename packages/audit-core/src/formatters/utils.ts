/**
 * Formatter Utilities
 *
 * Date and number formatting shared by the report formatters. Dates are
 * rendered in local time.
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * DD.MM.YYYY HH:MM
 */
export function formatGermanDateTime(date: Date): string {
  const day = `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * File name of the CSV export: uberall_kontrolle_YYYYMMDD_HHMM.csv
 */
export function reportFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `uberall_kontrolle_${day}_${pad(date.getHours())}${pad(date.getMinutes())}.csv`;
}

/**
 * Percentage with one decimal
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
