import { createHmac, timingSafeEqual } from "node:crypto";

export function hmacSha256Hex(secret: string, payload: string): string {
  return createHmac("sha256", secret).update(payload).digest("hex");
}

const SHA256_HEX = /^[0-9a-f]{64}$/i;

export function verifyHmacSha256Hex(secret: string, payload: string, signature: string): boolean {
  if (!SHA256_HEX.test(signature)) {
    return false;
  }
  const expected = Buffer.from(hmacSha256Hex(secret, payload), "hex");
  const actual = Buffer.from(signature, "hex");
  if (actual.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(actual, expected);
}
