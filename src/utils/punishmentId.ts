/**
 * Punishment ids: short lowercase Crockford base32 slugs that moderators can read out
 * and type back (`/sync revoke id:7k2mq9xd`).
 */
import { randomBytes } from "node:crypto";

const ALPHABET = "0123456789abcdefghjkmnpqrstvwxyz";
export const PUNISHMENT_ID_LENGTH = 8;

/** 40 random bits, five per character. */
export function generatePunishmentId(): string {
  const bytes = randomBytes(5);
  let value = 0n;
  for (const byte of bytes) value = (value << 8n) | BigInt(byte);

  let slug = "";
  for (let i = 0; i < PUNISHMENT_ID_LENGTH; i++) {
    slug = ALPHABET[Number(value % 32n)] + slug;
    value /= 32n;
  }
  return slug;
}

export function isValidPunishmentId(id: string): boolean {
  if (id.length !== PUNISHMENT_ID_LENGTH) return false;
  for (const char of id) {
    if (!ALPHABET.includes(char)) return false;
  }
  return true;
}
