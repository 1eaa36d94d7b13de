/**
 * Shape of google.protobuf.Timestamp as returned by the gax clients.
 * `seconds` arrives as a number, a decimal string or a Long depending on
 * client options.
 */
export interface ProtoTimestamp {
  seconds?: number | string | { toString(): string } | null;
  nanos?: number | null;
}

/**
 * Convert a protobuf timestamp to a Date. Missing timestamps map to the epoch.
 */
export function protoTimestampToDate(timestamp: ProtoTimestamp | null | undefined): Date {
  if (!timestamp) {
    return new Date(0);
  }
  const seconds = Number(timestamp.seconds?.toString() ?? 0);
  const nanos = timestamp.nanos ?? 0;
  return new Date(seconds * 1000 + Math.floor(nanos / 1_000_000));
}
