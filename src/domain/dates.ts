import { format, isValid, parse, parseISO } from "date-fns";

export const DEFAULT_OUTPUT_DATE_FORMAT = "yyyy-MM-dd";

// Fills in fields a pattern leaves out (e.g. the year of "dd.MM")
const REFERENCE_DATE = new Date(2000, 0, 1);

// Tried in order after ISO 8601. Ambiguous a/b/yyyy is read month first;
// day first only when the first part cannot be a month.
const AUTO_DETECT_FORMATS = [
  "yyyy/MM/dd",
  "yyyy/MM/dd HH:mm:ss",
  "yyyy/MM/dd HH:mm",
  "yyyy.MM.dd",
  "MM/dd/yyyy",
  "MM/dd/yyyy HH:mm:ss",
  "MM/dd/yyyy HH:mm",
  "MM-dd-yyyy",
  "dd/MM/yyyy",
  "dd/MM/yyyy HH:mm:ss",
  "dd/MM/yyyy HH:mm",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "dd.MM.yyyy HH:mm:ss",
  "dd.MM.yyyy HH:mm",
  "dd-MMM-yyyy",
  "d MMM yyyy",
  "d MMMM yyyy",
  "MMM d, yyyy",
  "MMMM d, yyyy",
  "yyyyMMdd",
];

/**
 * Parse a raw date cell. With `inputFormat` (a date-fns pattern) only that
 * pattern is accepted; otherwise ISO 8601 and then the common patterns
 * above are tried. Returns null instead of throwing.
 */
export const parseDate = (
  raw: unknown,
  inputFormat?: string,
): Date | null => {
  if (raw instanceof Date) return isValid(raw) ? raw : null;
  if (typeof raw !== "string" && typeof raw !== "number") return null;

  const value = String(raw).trim();
  if (value === "") return null;

  if (inputFormat) {
    const parsed = parse(value, inputFormat, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
  }

  const iso = parseISO(value);
  if (isValid(iso)) return iso;

  for (const pattern of AUTO_DETECT_FORMATS) {
    const parsed = parse(value, pattern, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
};

export const formatDate = (date: Date, pattern: string): string =>
  format(date, pattern);

/** Whether date-fns accepts `pattern` for formatting */
export const isFormatPattern = (pattern: string): boolean => {
  try {
    format(REFERENCE_DATE, pattern);
    return true;
  } catch {
    return false;
  }
};

/** Whether a date formatted with `pattern` parses back with it */
export const isParsePattern = (pattern: string): boolean =>
  isFormatPattern(pattern) &&
  isValid(parse(format(REFERENCE_DATE, pattern), pattern, REFERENCE_DATE));
