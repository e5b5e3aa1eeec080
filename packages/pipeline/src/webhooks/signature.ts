import { createHmac, timingSafeEqual } from "crypto";

export const SIGNATURE_PREFIX = "sha256=";

/** `sha256=<hex HMAC>` of the exact request body. */
export function signPayload(body: string, secret: string): string {
  return SIGNATURE_PREFIX + createHmac("sha256", secret).update(body).digest("hex");
}

/** Receiver-side check of a signature header value. */
export function verifySignature(body: string, secret: string, header: string | null | undefined): boolean {
  if (!header) return false;
  const expected = Buffer.from(signPayload(body, secret));
  const actual = Buffer.from(header);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
