export interface ParsedDate {
  /** `YYYY-MM` or `YYYY`; null for open ends and unrecognised input. */
  value: string | null;
  isOpenEnd: boolean;
  recognized: boolean;
}

export interface ParsedDuration {
  start: ParsedDate | null;
  end: ParsedDate | null;
  months: number | null;
  parsed: boolean;
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const OPEN_END_PATTERN = /^(present|current|currently|now|ongoing|till date|to date|today)$/;

export function normalizeDate(raw: string): ParsedDate {
  const text = raw.trim().toLowerCase().replace(/\s+/g, " ");
  if (!text) {
    return unrecognized();
  }
  if (OPEN_END_PATTERN.test(text)) {
    return { value: null, isOpenEnd: true, recognized: true };
  }

  const isoMatch = text.match(/^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?$/);
  if (isoMatch) {
    return yearMonth(Number(isoMatch[1]), Number(isoMatch[2]));
  }

  const slashMatch = text.match(/^(\d{1,2})\/(\d{4})$/);
  if (slashMatch) {
    return yearMonth(Number(slashMatch[2]), Number(slashMatch[1]));
  }

  const namedMatch = text.match(/^([a-z]+)\.?,? (\d{4})$/);
  if (namedMatch) {
    const monthIndex = MONTHS.indexOf(namedMatch[1].slice(0, 3));
    if (monthIndex < 0 || (namedMatch[1].length > 3 && !isMonthName(namedMatch[1]))) {
      return unrecognized();
    }
    return yearMonth(Number(namedMatch[2]), monthIndex + 1);
  }

  if (/^\d{4}$/.test(text)) {
    return isPlausibleYear(Number(text)) ? { value: text, isOpenEnd: false, recognized: true } : unrecognized();
  }

  return unrecognized();
}

export function parseDuration(raw: string): ParsedDuration {
  const text = raw.trim();
  if (!text) {
    return { start: null, end: null, months: null, parsed: false };
  }

  const range = splitRange(text);
  if (range) {
    const start = normalizeDate(range[0]);
    const end = normalizeDate(range[1]);
    if (start.recognized && !start.isOpenEnd && end.recognized) {
      const months = end.isOpenEnd ? null : monthsBetween(start.value, end.value);
      if (months === null || months >= 0) {
        return { start, end, months, parsed: true };
      }
    }
    return { start: null, end: null, months: null, parsed: false };
  }

  const lower = text.toLowerCase();
  const yearsMatch = lower.match(/(\d+(?:\.\d+)?)\s*(?:years?|yrs?)\b/);
  const monthsMatch = lower.match(/(\d+)\s*(?:months?|mos?)\b/);
  if (yearsMatch || monthsMatch) {
    const years = yearsMatch ? Number(yearsMatch[1]) : 0;
    const months = monthsMatch ? Number(monthsMatch[1]) : 0;
    return {
      start: null,
      end: null,
      months: Math.round(years * 12) + months,
      parsed: true,
    };
  }

  return { start: null, end: null, months: null, parsed: false };
}

/** Whole months between two normalised dates; null unless both have the same granularity. */
export function monthsBetween(start: string | null, end: string | null): number | null {
  if (!start || !end) {
    return null;
  }
  const startParts = start.split("-").map(Number);
  const endParts = end.split("-").map(Number);
  if (startParts.length !== endParts.length) {
    return null;
  }
  const yearDiff = endParts[0] - startParts[0];
  if (startParts.length === 1) {
    return yearDiff * 12;
  }
  return yearDiff * 12 + (endParts[1] - startParts[1]);
}

function splitRange(text: string): [string, string] | null {
  const yearRange = text.match(/^(\d{4})\s*-\s*(\d{4})$/);
  if (yearRange) {
    return [yearRange[1], yearRange[2]];
  }
  const parts = text.split(/\s*[–—]\s*|\s+(?:-|to)\s+/i);
  if (parts.length !== 2) {
    return null;
  }
  return [parts[0], parts[1]];
}

function yearMonth(year: number, month: number): ParsedDate {
  if (!isPlausibleYear(year) || month < 1 || month > 12) {
    return unrecognized();
  }
  return {
    value: `${year}-${String(month).padStart(2, "0")}`,
    isOpenEnd: false,
    recognized: true,
  };
}

function isMonthName(value: string): boolean {
  const full = [
    "january",
    "february",
    "march",
    "april",
    "may",
    "june",
    "july",
    "august",
    "september",
    "october",
    "november",
    "december",
  ];
  return full.includes(value) || value === "sept";
}

function isPlausibleYear(year: number): boolean {
  return Number.isInteger(year) && year >= 1900 && year <= 2100;
}

function unrecognized(): ParsedDate {
  return { value: null, isOpenEnd: false, recognized: false };
}
