import { describe, it, expect } from "vitest";
import { redactValue, describeText, REDACT_PATHS } from "./redactor.js";

describe("Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "test-password")).toBe("[REDACTED]");
      expect(redactValue("secret", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("token", "test-token")).toBe("[REDACTED]");
      expect(redactValue("apikey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("api_key", "test-key")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Bearer test-token")).toBe("[REDACTED]");
      expect(redactValue("encryptionkey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("credential", "test-key")).toBe("[REDACTED]");
      expect(redactValue("ciphertext", "abcd")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "test-password")).toBe("[REDACTED]");
      expect(redactValue("SECRET", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("ApiKey", "test-key")).toBe("[REDACTED]");
    });

    it("redacts email addresses in string values", () => {
      const result = redactValue("message", "Contact user@example.com for details");
      expect(result).toBe("Contact [REDACTED] for details");
    });

    it("redacts multiple email addresses", () => {
      const result = redactValue("log", "From a@b.com to c@d.com");
      expect(result).toBe("From [REDACTED] to [REDACTED]");
    });

    it("redacts consistently across repeated calls", () => {
      expect(redactValue("log", "x@y.org")).toBe("[REDACTED]");
      expect(redactValue("log", "x@y.org")).toBe("[REDACTED]");
    });

    it("does not modify non-sensitive values", () => {
      expect(redactValue("filename", "notes.md")).toBe("notes.md");
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("active", true)).toBe(true);
      expect(redactValue("data", null)).toBe(null);
      expect(redactValue("name", "")).toBe("");
    });
  });

  describe("describeText", () => {
    it("reports size only", () => {
      expect(describeText("one\ntwo")).toEqual({ chars: 7, lines: 2 });
      expect(describeText("")).toEqual({ chars: 0, lines: 0 });
    });
  });

  describe("REDACT_PATHS", () => {
    it("includes credential paths", () => {
      expect(REDACT_PATHS).toContain("apiKey");
      expect(REDACT_PATHS).toContain("credential");
      expect(REDACT_PATHS).toContain("encryptionKey");
      expect(REDACT_PATHS).toContain("*.apiKey");
      expect(REDACT_PATHS).toContain("*.authorization");
    });

    it("has both top-level and nested for each sensitive key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
