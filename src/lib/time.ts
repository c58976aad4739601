const MS_PER_HOUR = 3_600_000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses a calendar date or timestamp as UTC. Date-only strings resolve to
 * midnight UTC, and timestamps without an explicit zone are read as UTC too.
 */
export function parseUtcDate(input: string): Date | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  let normalized = trimmed;
  if (DATE_ONLY.test(trimmed)) {
    normalized = `${trimmed}T00:00:00Z`;
  }
  else if (!HAS_ZONE.test(trimmed)) {
    normalized = `${trimmed.replace(" ", "T")}Z`;
  }
  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Hours elapsed between the archive's init date and `date`. */
export function toRelativeHours(date: Date, initDate: Date): number {
  return (date.getTime() - initDate.getTime()) / MS_PER_HOUR;
}

export function toAbsolute(hours: number, initDate: Date): Date {
  return new Date(initDate.getTime() + Math.round(hours * MS_PER_HOUR));
}
