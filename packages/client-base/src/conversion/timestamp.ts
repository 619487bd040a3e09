// =============================================================================
// Timestamp Conversion
// =============================================================================
// Conversions between `Date` and the protobuf well-known `Timestamp` shape.

/** Plain form of `google.protobuf.Timestamp` */
export interface Timestamp {
  readonly seconds: number;
  readonly nanos: number;
}

const MILLIS_PER_SECOND = 1000;
const NANOS_PER_MILLI = 1_000_000;

/**
 * Convert a date to a timestamp. `undefined` passes through.
 */
export function toTimestamp(date: Date): Timestamp;
export function toTimestamp(date: undefined): undefined;
export function toTimestamp(date: Date | undefined): Timestamp | undefined;
export function toTimestamp(date: Date | undefined): Timestamp | undefined {
  if (date === undefined) return undefined;
  const millis = date.getTime();
  // nanos is never negative, pre-epoch dates borrow from seconds
  const seconds = Math.floor(millis / MILLIS_PER_SECOND);
  const nanos = (millis - seconds * MILLIS_PER_SECOND) * NANOS_PER_MILLI;
  return { seconds, nanos };
}

/**
 * Convert a timestamp to a date. Precision below a millisecond is truncated.
 */
export const toDate = (timestamp: Timestamp): Date =>
  new Date(
    timestamp.seconds * MILLIS_PER_SECOND +
      Math.trunc(timestamp.nanos / NANOS_PER_MILLI),
  );
