export const ITEMS_RAW_MAX_LENGTH = 500;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const MONTH_DAY_YEAR = /^([A-Za-z]{3})\s+(\d{1,2}),\s+(\d{4})$/;
const ISO_DAY = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatCalendarDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return null;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T00:00:00`;
}

/**
 * Normalizes "Jan 2, 2025" (when the value has a comma) or "2025-01-02" to
 * `YYYY-MM-DDT00:00:00`. Anything else is returned unchanged.
 */
export function normalizeOrderDate(value: string): string {
  if (value.includes(',')) {
    const match = MONTH_DAY_YEAR.exec(value);
    if (!match) return value;
    const month = MONTHS.indexOf(match[1].toLowerCase()) + 1;
    return formatCalendarDate(Number(match[3]), month, Number(match[2])) ?? value;
  }
  const match = ISO_DAY.exec(value);
  if (!match) return value;
  return formatCalendarDate(Number(match[1]), Number(match[2]), Number(match[3])) ?? value;
}

/** Currency cell: thousands separators dropped, 0 when empty or unparseable. */
export function normalizeAmount(value: string): number {
  const cleaned = value.replace(/,/g, '').trim();
  if (!FLOAT.test(cleaned)) return 0;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function normalizeContactId(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseOrderId(value: string): number | null {
  if (!/^[+-]?\d+$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function splitGalleries(value: string): string[] {
  return value.split(',').map((gallery) => gallery.trim());
}

export function countItems(value: string): number {
  return value ? value.split('\n').length : 0;
}

export function truncateItems(value: string): string | null {
  return value ? Array.from(value).slice(0, ITEMS_RAW_MAX_LENGTH).join('') : null;
}
