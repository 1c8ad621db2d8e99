import { createHmac, timingSafeEqual } from "node:crypto";

const SIGNATURE_PREFIX = "sha256=";

export function signPayload(secret: string, body: Buffer | string): string {
  return `${SIGNATURE_PREFIX}${createHmac("sha256", secret).update(body).digest("hex")}`;
}

/** Checks an `X-Hub-Signature-256` header against the raw request body. */
export function verifySignature(
  secret: string,
  body: Buffer | string,
  header: string | undefined
): boolean {
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expected = Buffer.from(signPayload(secret, body), "utf8");
  const received = Buffer.from(header, "utf8");

  if (expected.length !== received.length) {
    return false;
  }

  return timingSafeEqual(expected, received);
}
