import { describe, it, expect } from "vitest";
import { ValidationError } from "@docchat/errors";
import { decrypt, deriveKeyId, encrypt, isEncryptedData } from "./encryption.js";

const MASTER_KEY = "0123456789abcdef0123456789abcdef";
const OTHER_KEY = "fedcba9876543210fedcba9876543210";
const PROVIDER_KEY = "test-key-for-openai";

function flipFirstByte(hex: string): string {
  const first = parseInt(hex.slice(0, 2), 16);
  return (first ^ 0xff).toString(16).padStart(2, "0") + hex.slice(2);
}

describe("provider key envelopes", () => {
  it("seals a key into hex fields tagged with the master key fingerprint", () => {
    const sealed = encrypt(PROVIDER_KEY, MASTER_KEY);

    expect(sealed.iv).toMatch(/^[0-9a-f]{24}$/);
    expect(sealed.tag).toMatch(/^[0-9a-f]{32}$/);
    expect(sealed.ciphertext).toHaveLength(PROVIDER_KEY.length * 2);
    expect(sealed.keyId).toBe(deriveKeyId(MASTER_KEY));
    expect(sealed.ciphertext).not.toContain(Buffer.from(PROVIDER_KEY).toString("hex"));
  });

  it("uses a fresh IV for every seal", () => {
    const a = encrypt(PROVIDER_KEY, MASTER_KEY);
    const b = encrypt(PROVIDER_KEY, MASTER_KEY);

    expect(a.iv).not.toBe(b.iv);
    expect(a.ciphertext).not.toBe(b.ciphertext);
  });

  it("opens what it sealed", () => {
    expect(decrypt(encrypt(PROVIDER_KEY, MASTER_KEY), MASTER_KEY)).toBe(PROVIDER_KEY);
    expect(decrypt(encrypt("clé-\u{1F511}", MASTER_KEY), MASTER_KEY)).toBe("clé-\u{1F511}");
  });

  it("refuses an envelope sealed under another master key", () => {
    const sealed = encrypt(PROVIDER_KEY, OTHER_KEY);

    expect(() => decrypt(sealed, MASTER_KEY)).toThrow(
      "Encrypted value was sealed with a different key",
    );
  });

  it("detects a modified ciphertext", () => {
    const sealed = encrypt(PROVIDER_KEY, MASTER_KEY);

    expect(() => decrypt({ ...sealed, ciphertext: flipFirstByte(sealed.ciphertext) }, MASTER_KEY)).toThrow();
  });

  it("detects a modified auth tag", () => {
    const sealed = encrypt(PROVIDER_KEY, MASTER_KEY);

    expect(() => decrypt({ ...sealed, tag: flipFirstByte(sealed.tag) }, MASTER_KEY)).toThrow();
  });

  it("requires a 32-byte master key", () => {
    expect(() => encrypt(PROVIDER_KEY, "too-short")).toThrow(ValidationError);
    expect(() => encrypt(PROVIDER_KEY, "too-short")).toThrow("Key must be exactly 32 bytes, got 9");
    // 31 ASCII characters plus one two-byte character is 33 bytes.
    expect(() => encrypt(PROVIDER_KEY, `${"a".repeat(31)}é`)).toThrow("got 33");
  });

  it("derives a stable 16-character fingerprint", () => {
    expect(deriveKeyId(MASTER_KEY)).toHaveLength(16);
    expect(deriveKeyId(MASTER_KEY)).toBe(deriveKeyId(MASTER_KEY));
    expect(deriveKeyId(MASTER_KEY)).not.toBe(deriveKeyId(OTHER_KEY));
  });
});

describe("isEncryptedData", () => {
  it("accepts an envelope produced by encrypt", () => {
    expect(isEncryptedData(encrypt(PROVIDER_KEY, MASTER_KEY))).toBe(true);
  });

  it("rejects missing or non-hex fields", () => {
    expect(isEncryptedData(null)).toBe(false);
    expect(isEncryptedData({ iv: "ab", ciphertext: "cd", tag: "ef" })).toBe(false);
    expect(isEncryptedData({ iv: "zz", ciphertext: "cd", tag: "ef", keyId: "k" })).toBe(false);
    expect(isEncryptedData({ iv: "ab", ciphertext: "cd", tag: "ef", keyId: "k" })).toBe(true);
  });
});
