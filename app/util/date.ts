/**
 * Converts a Date object into an ISO String representation (truncates milliseconds)
 *
 * @param date - The date to convert
 * @returns An ISO string representation of the date, with milliseconds truncated
 */
export function toISODateTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}/g, '');
}

/**
 * Returns a new date offset from the given one
 *
 * @param date - The starting date
 * @param seconds - The number of seconds to add (may be negative)
 */
export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
