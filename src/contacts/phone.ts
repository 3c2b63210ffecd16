import type { CountryCode } from "libphonenumber-js";
import { parsePhoneNumberFromString } from "libphonenumber-js";

export const DEFAULT_REGION: CountryCode = "US";

/**
 * Canonical `+<country code><national number>` form, or undefined when the
 * input cannot be read as a phone number. Numbers are not validated against
 * numbering plans, only parsed.
 */
export function normalizePhoneNumber(input: string, region: CountryCode = DEFAULT_REGION): string | undefined {
  const parsed = parsePhoneNumberFromString(input, region);
  if (!parsed) return undefined;
  return `+${parsed.countryCallingCode}${parsed.nationalNumber}`;
}

export type ContactKind = "phone" | "email" | "shortcode" | "unknown";

export type ContactPoint =
  | { kind: "phone"; value: string }
  | { kind: "email"; value: string }
  | { kind: "shortcode"; value: string }
  | { kind: "unknown"; value: string };

const SHORTCODE_RE = /^\d{1,6}$/;

/**
 * Classify a free-text contact value. Emails and short codes keep their raw
 * value; phone numbers are normalized; anything else is "unknown".
 */
export function classifyContact(raw: string, region: CountryCode = DEFAULT_REGION): ContactPoint {
  if (raw.includes("@")) return { kind: "email", value: raw };
  if (SHORTCODE_RE.test(raw)) return { kind: "shortcode", value: raw };
  const phone = normalizePhoneNumber(raw, region);
  if (phone) return { kind: "phone", value: phone };
  return { kind: "unknown", value: raw };
}

/** Key used to join a messaging handle against the contact resolution table. */
export function contactKey(raw: string, region: CountryCode = DEFAULT_REGION): string {
  return classifyContact(raw, region).value;
}
