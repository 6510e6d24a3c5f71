import { CustomSourceError, DurationRange } from "../types.js";
import { isInteger } from "../utils/type-guards.js";

export function toDurationRange(value: unknown): DurationRange {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new CustomSourceError(
      "malformed-event",
      "Buffered range must be a [start, end] pair",
    );
  }
  const [start, end]: unknown[] = value;
  if (!isInteger(start) || !isInteger(end)) {
    throw new CustomSourceError(
      "malformed-event",
      "Buffered range bounds must be integer milliseconds",
    );
  }
  return { start, end };
}

/**
 * Converts raw `[startMs, endMs]` pairs one-to-one, keeping the engine's order.
 * Overlapping or unsorted ranges are passed through as they are.
 */
export function toBufferedRanges(values: unknown): DurationRange[] {
  if (!Array.isArray(values)) {
    throw new CustomSourceError(
      "malformed-event",
      "Buffered ranges must be an array",
    );
  }
  return values.map((value: unknown) => toDurationRange(value));
}

export function durationRangeToString({ start, end }: DurationRange) {
  return `[${start}, ${end}]`;
}
