const MAX_DERIVED_YEARS = 50;

const EXPLICIT_YEARS_PATTERNS: ReadonlyArray<RegExp> = [
  /(\d+(?:\.\d+)?)\s*years?\s*(?:of\s*)?experience/i,
  /experience\s*:\s*(\d+(?:\.\d+)?)/i,
  /(\d+)\s*\+\s*years/i,
  /over\s*(\d+(?:\.\d+)?)\s*years/i,
  /more\s*than\s*(\d+(?:\.\d+)?)\s*years/i,
];

const DATE_RANGE_PATTERNS: ReadonlyArray<RegExp> = [
  /(\d{4})\s*–\s*(\d{4})/g,
  /(\d{4})\s*-\s*(\d{4})/g,
  /(\d{4})\s*to\s*(\d{4})/g,
  /(\w{3}\s*\d{4})\s*–\s*(\w{3}\s*\d{4})/g,
  /(\w{3}\s*\d{4})\s*-\s*(\w{3}\s*\d{4})/g,
];

/**
 * Years of experience from free text: an explicit phrase wins, otherwise
 * positive-length year ranges from resume-like text are summed.
 * Returns 0 when nothing matches; callers treat 0 as "not found".
 */
export function extractYearsExperience(text: string, currentYear = new Date().getFullYear()): number {
  for (const pattern of EXPLICIT_YEARS_PATTERNS) {
    const match = pattern.exec(text);
    const value = match ? Number(match[1]) : Number.NaN;
    if (Number.isFinite(value)) {
      return value;
    }
  }

  let totalYears = 0;
  for (const pattern of DATE_RANGE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const startYear = readYear(match[1]);
      let endYear = readYear(match[2]);
      if (startYear === null || endYear === null) {
        continue;
      }
      if (endYear > currentYear) {
        endYear = currentYear;
      }
      const years = endYear - startYear;
      if (years > 0) {
        totalYears += years;
      }
    }
  }

  if (totalYears > 0) {
    return Math.min(totalYears, MAX_DERIVED_YEARS);
  }
  return 0;
}

function readYear(value: string | undefined): number | null {
  const match = value ? /\d{4}/.exec(value) : null;
  return match ? Number(match[0]) : null;
}
