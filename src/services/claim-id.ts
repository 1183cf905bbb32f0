/**
 * Claim id helpers.
 *
 * Claim ids are a string contract downstream consumers rely on:
 * `CLAIM-` followed by a 14-digit local timestamp (YYYYMMDDHHmmss).
 */

export const CLAIM_ID_PATTERN = /^CLAIM-\d{14}$/;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Generate a claim id from a point in time (local time).
 */
export function generateClaimId(now: Date = new Date()): string {
  return (
    "CLAIM-" +
    pad(now.getFullYear(), 4) +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds())
  );
}

/**
 * Whether a value follows the claim id format.
 */
export function isClaimId(value: string): boolean {
  return CLAIM_ID_PATTERN.test(value);
}

let lastIssuedSecond = 0;

/**
 * Issue a claim id that no earlier call in this process has returned.
 * When the current second is taken, the next free second is used.
 *
 * The id has one-second resolution and no room for a sequence suffix, so a
 * burst of N ids within one second runs up to N - 1 seconds ahead of the
 * clock. Ids return to the clock once it passes the last issued second.
 * The id orders claims; the creation time is the intake audit entry's
 * `timestamp`.
 */
export function nextClaimId(now: Date = new Date()): string {
  const second = Math.max(Math.floor(now.getTime() / 1000), lastIssuedSecond + 1);
  lastIssuedSecond = second;
  return generateClaimId(new Date(second * 1000));
}
