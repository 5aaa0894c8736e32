export const MS_PER_DAY = 86_400_000;

/** Whole days between created_at and asOf; records from the future are age 0 */
export function ageInDays(createdAt: string | Date, asOf: Date): number {
  const created = typeof createdAt === "string" ? Date.parse(createdAt) : createdAt.getTime();
  const days = Math.floor((asOf.getTime() - created) / MS_PER_DAY);
  return Math.max(0, days);
}

/** Whole days since the epoch; two instants on the same UTC day share it */
export function dayIndex(at: string | Date): number {
  const ms = typeof at === "string" ? Date.parse(at) : at.getTime();
  return Math.floor(ms / MS_PER_DAY);
}

export function daysAgo(days: number, from: Date = new Date()): Date {
  return new Date(from.getTime() - days * MS_PER_DAY);
}

export function parseDate(value: string, field: string): Date {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new RangeError(`${field}: not a valid date: ${value}`);
  }
  return new Date(ms);
}
