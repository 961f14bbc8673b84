export const DEFAULT_WINDOW_SIZE = 24;

/**
 * Next `limit` samples at or after `now`, in the order the timeline lists them.
 *
 * The timeline is not sorted first: providers deliver it ascending, and for an
 * unsorted input "first N" means first N in source order.
 */
export function selectForecastWindow<T extends { timestamp: Date }>(
  timeline: readonly T[],
  now: Date,
  limit: number = DEFAULT_WINDOW_SIZE
): T[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`Window size must be a non-negative integer, got ${limit}`);
  }

  const reference = now.getTime();
  return timeline.filter((sample) => sample.timestamp.getTime() - reference >= 0).slice(0, limit);
}
