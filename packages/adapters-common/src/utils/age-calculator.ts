const MILLISECONDS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Calculate the age of a date in whole days.
 *
 * @param date - The date to calculate age for
 * @param now - Reference time (defaults to the current time)
 */
export function calculateAgeDays(date: Date, now: Date = new Date()): number {
  const diffMs = now.getTime() - date.getTime();
  return Math.floor(diffMs / MILLISECONDS_PER_DAY);
}

/**
 * Human-readable age, e.g. "today", "1 day ago", "12 days ago".
 */
export function describeAge(date: Date, now: Date = new Date()): string {
  const days = calculateAgeDays(date, now);
  if (days <= 0) return "today";
  if (days === 1) return "1 day ago";
  return `${days} days ago`;
}

/**
 * Format a date for use as a GCP label value.
 * Labels can only contain lowercase letters, numbers, hyphens, and underscores.
 */
export function formatDateLabel(date: Date): string {
  // 2024-01-15-12-30-45
  return date.toISOString().replace(/[T:]/g, "-").replace(/\.\d{3}Z$/, "").toLowerCase();
}

/**
 * Parse a date written by formatDateLabel.
 * Returns undefined for values that don't parse.
 */
export function parseDateLabel(label: string): Date | undefined {
  const parts = label.split("-");
  const date =
    parts.length >= 6
      ? new Date(`${parts[0]}-${parts[1]}-${parts[2]}T${parts[3]}:${parts[4]}:${parts[5]}Z`)
      : new Date(label);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
