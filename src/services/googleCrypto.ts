// src/services/googleCrypto.ts
// Refresh tokens at rest: AES-256-GCM bound to the integration's account id,
// stored as "iv.ciphertext.tag" in base64url.
import crypto from "crypto";

const ALGORITHM = "aes-256-gcm";
const IV_BYTES = 12;

// GOOGLE_TOKEN_ENCRYPTION_KEY: 32 bytes, base64.
function tokenKey(): Buffer {
  const key = Buffer.from(process.env.GOOGLE_TOKEN_ENCRYPTION_KEY || "", "base64");
  if (key.length !== 32) throw new Error("google_token_key_invalid");
  return key;
}

function boundTo(accountId: string) {
  return Buffer.from(`google_integrations:${accountId}`, "utf8");
}

export function sealRefreshToken(accountId: string, token: string): string {
  const iv = crypto.randomBytes(IV_BYTES);
  const cipher = crypto.createCipheriv(ALGORITHM, tokenKey(), iv);
  cipher.setAAD(boundTo(accountId));

  const sealed = Buffer.concat([cipher.update(token, "utf8"), cipher.final()]);
  return [iv, sealed, cipher.getAuthTag()].map((b) => b.toString("base64url")).join(".");
}

/** Throws when the value was sealed for another account or altered. */
export function openRefreshToken(accountId: string, stored: string): string {
  const parts = String(stored || "").split(".");
  if (parts.length !== 3 || parts.some((p) => !p)) throw new Error("google_token_malformed");

  const [iv, sealed, tag] = parts.map((p) => Buffer.from(p, "base64url"));
  const decipher = crypto.createDecipheriv(ALGORITHM, tokenKey(), iv);
  decipher.setAAD(boundTo(accountId));
  decipher.setAuthTag(tag);

  return Buffer.concat([decipher.update(sealed), decipher.final()]).toString("utf8");
}
