/** 2001-01-01T00:00:00Z, the reference date of Core Data and NSDate. */
export const COCOA_EPOCH_MS = Date.UTC(2001, 0, 1);

/** Values above this are nanoseconds rather than seconds (iOS 11+ message dates). */
const NANOSECOND_THRESHOLD = 100_000_000_000n;

const INTEGER_RE = /^-?\d+$/;

export function cocoaSecondsToDate(seconds: number): Date {
  return new Date(COCOA_EPOCH_MS + seconds * 1000);
}

/**
 * Message and attachment timestamps: seconds on older releases, nanoseconds
 * on newer ones. Nanosecond values exceed 2^53, so integers are read from
 * their text form. Zero and null mean "not recorded".
 */
export function cocoaTimestampToIso(value: string | number | null): string | null {
  if (value === null) return null;
  const raw = String(value).trim();

  if (INTEGER_RE.test(raw)) {
    const exact = BigInt(raw);
    if (exact === 0n) return null;
    const magnitude = exact < 0n ? -exact : exact;
    if (magnitude > NANOSECOND_THRESHOLD) {
      return new Date(COCOA_EPOCH_MS + Number(exact / 1_000_000n)).toISOString();
    }
    return cocoaSecondsToDate(Number(exact)).toISOString();
  }

  const number = Number(raw);
  if (raw === "" || !Number.isFinite(number) || number === 0) return null;
  const seconds = Math.abs(number) > Number(NANOSECOND_THRESHOLD) ? number / 1e9 : number;
  return cocoaSecondsToDate(seconds).toISOString();
}
