type TimestampLike = { toDate: () => Date };

const isTimestampLike = (value: unknown): value is TimestampLike =>
  typeof value === "object" &&
  value !== null &&
  "toDate" in value &&
  typeof value.toDate === "function";

const isValidDate = (value: Date): boolean => !Number.isNaN(value.getTime());

/** Accepts a Date, a Firestore Timestamp, an ISO string or epoch millis. */
export const coerceDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return isValidDate(value) ? value : null;
  }
  if (isTimestampLike(value)) {
    const converted = value.toDate();
    return converted instanceof Date && isValidDate(converted) ? converted : null;
  }
  if (typeof value === "string" || typeof value === "number") {
    const converted = new Date(value);
    return isValidDate(converted) ? converted : null;
  }
  return null;
};

export const addMilliseconds = (date: Date, ms: number): Date => new Date(date.getTime() + ms);

export const laterOf = (a: Date, b: Date): Date => (a.getTime() >= b.getTime() ? a : b);
