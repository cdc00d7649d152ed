import crypto from "crypto";

/** Produces the current one-time code for login. */
export interface TotpProvider {
  now(): string;
}

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

const TOTP_CONFIG = {
  /** Time step in seconds */
  period: 30,
  digits: 6,
};

export function decodeBase32(input: string): Buffer {
  const cleaned = input.toUpperCase().replace(/[\s=]/g, "");
  const bytes: number[] = [];
  let buffer = 0;
  let bits = 0;

  for (const char of cleaned) {
    const value = BASE32_ALPHABET.indexOf(char);
    if (value === -1) {
      throw new Error(`Invalid base32 character "${char}" in TOTP seed`);
    }
    buffer = (buffer << 5) | value;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((buffer >> bits) & 0xff);
    }
  }

  return Buffer.from(bytes);
}

/**
 * RFC 6238 code for a base32 seed at the given time.
 * @param timestamp - Unix ms
 */
export function generateTotp(seed: string, timestamp: number, digits = TOTP_CONFIG.digits): string {
  const key = decodeBase32(seed);
  if (key.length === 0) {
    throw new Error("TOTP seed is empty");
  }

  const counter = Buffer.alloc(8);
  counter.writeBigUInt64BE(BigInt(Math.floor(timestamp / 1000 / TOTP_CONFIG.period)));

  const hmac = crypto.createHmac("sha1", key).update(counter).digest();
  const offset = hmac[hmac.length - 1] & 0x0f;
  const binary =
    ((hmac[offset] & 0x7f) << 24) |
    ((hmac[offset + 1] & 0xff) << 16) |
    ((hmac[offset + 2] & 0xff) << 8) |
    (hmac[offset + 3] & 0xff);

  return String(binary % 10 ** digits).padStart(digits, "0");
}

export class SeedTotp implements TotpProvider {
  constructor(
    private _seed: string,
    private _clock: () => number = Date.now,
  ) {}

  now(): string {
    return generateTotp(this._seed, this._clock());
  }
}
