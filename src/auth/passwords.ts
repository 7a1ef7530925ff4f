import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

const HASH_SCHEME = "scrypt";
const SALT_BYTES = 16;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

/** Well-formed hash no password derives to; verifying against it costs one scrypt run. */
export const UNMATCHABLE_PASSWORD_HASH = `${HASH_SCHEME}$${"0".repeat(SALT_BYTES * 2)}$${"0".repeat(KEY_LENGTH * 2)}`;

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const derived = await deriveKey(password, salt);
  return `${HASH_SCHEME}$${salt.toString("hex")}$${derived.toString("hex")}`;
}

export async function verifyPassword(password: string, storedHash: string): Promise<boolean> {
  const [scheme, saltHex, hashHex] = storedHash.split("$");
  if (scheme !== HASH_SCHEME || !saltHex || !hashHex) {
    return false;
  }

  const expected = Buffer.from(hashHex, "hex");
  if (expected.length !== KEY_LENGTH) {
    return false;
  }

  const derived = await deriveKey(password, Buffer.from(saltHex, "hex"));
  return timingSafeEqual(derived, expected);
}
