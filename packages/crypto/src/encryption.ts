import crypto from "node:crypto";
import { ValidationError } from "@docchat/errors";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const HEX = /^[0-9a-f]*$/;

/** Envelope stored for every provider key. All fields are hex except `keyId`. */
export interface EncryptedData {
  iv: string;
  ciphertext: string;
  tag: string;
  keyId: string;
}

function validateKey(key: string): Buffer {
  const keyBuffer = Buffer.from(key, "utf-8");
  if (keyBuffer.length !== KEY_LENGTH) {
    throw new ValidationError(
      `Key must be exactly ${String(KEY_LENGTH)} bytes, got ${String(keyBuffer.length)}`,
      { key: "length" },
    );
  }
  return keyBuffer;
}

/** Short fingerprint of a key, safe to store next to the ciphertext. */
export function deriveKeyId(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex").slice(0, 16);
}

function stringField(value: object, key: keyof EncryptedData): string | null {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : null;
}

export function isEncryptedData(value: unknown): value is EncryptedData {
  if (typeof value !== "object" || value === null) return false;
  const iv = stringField(value, "iv");
  const ciphertext = stringField(value, "ciphertext");
  const tag = stringField(value, "tag");
  return (
    iv !== null &&
    ciphertext !== null &&
    tag !== null &&
    stringField(value, "keyId") !== null &&
    HEX.test(iv) &&
    HEX.test(ciphertext) &&
    HEX.test(tag)
  );
}

export function encrypt(plaintext: string, key: string): EncryptedData {
  const keyBuffer = validateKey(key);
  const iv = crypto.randomBytes(IV_LENGTH);

  const cipher = crypto.createCipheriv(ALGORITHM, keyBuffer, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const tag = cipher.getAuthTag();

  return {
    iv: iv.toString("hex"),
    ciphertext: encrypted.toString("hex"),
    tag: tag.toString("hex"),
    keyId: deriveKeyId(key),
  };
}

/**
 * Throws `ValidationError` when the envelope was sealed with another key;
 * the GCM tag check rejects tampered data.
 */
export function decrypt(data: EncryptedData, key: string): string {
  const keyBuffer = validateKey(key);
  if (data.keyId !== deriveKeyId(key)) {
    throw new ValidationError("Encrypted value was sealed with a different key", {
      keyId: "mismatch",
    });
  }
  const iv = Buffer.from(data.iv, "hex");
  const ciphertext = Buffer.from(data.ciphertext, "hex");
  const tag = Buffer.from(data.tag, "hex");

  const decipher = crypto.createDecipheriv(ALGORITHM, keyBuffer, iv);
  decipher.setAuthTag(tag);

  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  return decrypted.toString("utf-8");
}
