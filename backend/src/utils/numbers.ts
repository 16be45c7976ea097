export const roundTo = (value: number, digits: number): number => {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const utcMidnight = (date: Date): number =>
  Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

/** Whole calendar days from `from` to `to`, compared as UTC dates. */
export const daysBetween = (from: Date, to: Date): number =>
  Math.floor((utcMidnight(to) - utcMidnight(from)) / MS_PER_DAY);

/** Date-only ISO form (YYYY-MM-DD) used for maintenance dates. */
export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);
