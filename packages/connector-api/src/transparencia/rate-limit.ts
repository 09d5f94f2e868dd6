/**
 * Hour-of-day request throttle for the Portal da Transparência API.
 *
 * The API allows more requests per minute overnight; some endpoints are
 * "restricted" and stay at the lowest limit all day.
 */

export const RESTRICTED_REQUESTS_PER_MINUTE = 180;
export const NIGHT_REQUESTS_PER_MINUTE = 700;
export const DAY_REQUESTS_PER_MINUTE = 400;

/** Night window is [start, end) in local wall-clock hours */
export const NIGHT_WINDOW = { start: 0, end: 6 } as const;

export function resolveRequestsPerMinute(hour: number, restricted = false): number {
  if (restricted) return RESTRICTED_REQUESTS_PER_MINUTE;
  if (hour >= NIGHT_WINDOW.start && hour < NIGHT_WINDOW.end) return NIGHT_REQUESTS_PER_MINUTE;
  return DAY_REQUESTS_PER_MINUTE;
}

/**
 * Delay to wait before a single request, in milliseconds (60 / limit seconds)
 */
export function computeRequestDelayMs(hour: number, restricted = false): number {
  return 60_000 / resolveRequestsPerMinute(hour, restricted);
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}
