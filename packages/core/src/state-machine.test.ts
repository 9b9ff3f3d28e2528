import { describe, it, expect } from "vitest";
import { InvalidTransitionError } from "@docchat/errors";
import { PROCESSING_STATES } from "@docchat/types";
import { assertTransition, canTransition, isSettled } from "./state-machine.js";

describe("processing state machine", () => {
  it("moves forward one stage at a time", () => {
    expect(canTransition("uploaded", "extracting")).toBe(true);
    expect(canTransition("extracting", "chunking")).toBe(true);
    expect(canTransition("chunking", "embedding")).toBe(true);
    expect(canTransition("embedding", "indexed")).toBe(true);
  });

  it("does not skip stages or go backwards", () => {
    expect(canTransition("uploaded", "indexed")).toBe(false);
    expect(canTransition("extracting", "embedding")).toBe(false);
    expect(canTransition("embedding", "chunking")).toBe(false);
  });

  it.each(["uploaded", "extracting", "chunking", "embedding"] as const)(
    "allows failing from %s",
    (state) => {
      expect(canTransition(state, "failed")).toBe(true);
    },
  );

  it("only leaves a settled state through reprocessing", () => {
    for (const to of PROCESSING_STATES) {
      expect(canTransition("indexed", to)).toBe(to === "uploaded");
      expect(canTransition("failed", to)).toBe(to === "uploaded");
    }
  });

  it("throws InvalidTransitionError for disallowed moves", () => {
    expect(() => assertTransition("extracting", "uploaded")).toThrow(InvalidTransitionError);
    expect(() => assertTransition("extracting", "uploaded")).toThrow(
      "Invalid processing transition: extracting -> uploaded",
    );
    expect(() => assertTransition("embedding", "indexed")).not.toThrow();
  });

  it("treats indexed and failed as settled", () => {
    expect(PROCESSING_STATES.filter(isSettled)).toEqual(["indexed", "failed"]);
  });
});
