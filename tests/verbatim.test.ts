import { describe, expect, it } from "vitest";
import { VerificationInputEmptyError } from "../src/lib/errors";
import {
  expectVerbatim,
  normalizeForComparison,
  verifyVerbatim,
} from "../src/lib/verification/verbatim";

describe("normalizeForComparison", () => {
  it("drops tags, decodes entities and folds punctuation and spacing", () => {
    expect(normalizeForComparison("<p>Hello,&nbsp;World!</p>")).toBe("hello world");
  });

  it("removes accents", () => {
    expect(normalizeForComparison("Café  Crème")).toBe("cafe creme");
  });
});

describe("verifyVerbatim", () => {
  it("accepts a contiguous passage despite case and punctuation", () => {
    const result = verifyVerbatim(
      "the quick brown fox",
      "The quick, brown fox jumps over the lazy dog.",
    );
    expect(result).toEqual({ isVerbatim: true, detail: "The extraction is verbatim." });
  });

  it("rejects a passage that skips words", () => {
    const result = verifyVerbatim("quick fox jumps", "The quick brown fox jumps.");
    expect(result.isVerbatim).toBe(false);
    expect(result.detail).toBe(
      "The extraction is NOT verbatim: it does not appear as one contiguous passage of the original text.",
    );
  });

  it("does not accept a matching start and end with a different middle", () => {
    const result = verifyVerbatim(
      "Cells were stained and imaged",
      "Cells were fixed, stained and then imaged.",
    );
    expect(result.isVerbatim).toBe(false);
  });

  it("compares markup against plain text", () => {
    const result = verifyVerbatim(
      "Cells were &lt;10 µm",
      "<p>Cells were <b>&lt;10</b> µm wide</p>",
    );
    expect(result.isVerbatim).toBe(true);
  });

  it("keeps comparison signs that are not markup", () => {
    const original =
      "Cells were counted (p < 0.05, n > 3 mice per group) after staining.";
    expect(normalizeForComparison(original)).toBe(
      "cells were counted p 005 n 3 mice per group after staining",
    );
    expect(verifyVerbatim("Cells were counted (p < 0.05", original).isVerbatim).toBe(true);
    expect(verifyVerbatim("n > 3 mice per group", original).isVerbatim).toBe(true);
  });

  it("tolerates line breaks inside the extraction", () => {
    expect(verifyVerbatim("line one\n   line two", "Line one line two.").isVerbatim).toBe(true);
  });

  it("explains empty input", () => {
    expect(verifyVerbatim("", "")).toEqual({ isVerbatim: false, detail: "Both texts are empty." });
    expect(verifyVerbatim("", "abc").detail).toBe("The extracted text is empty.");
    expect(verifyVerbatim("abc", "").detail).toBe("The original text is empty.");
  });

  it("explains text that normalises to nothing", () => {
    expect(verifyVerbatim("...", "abc")).toEqual({
      isVerbatim: false,
      detail: "The extracted text has no letters or digits left after normalisation.",
    });
  });
});

describe("expectVerbatim", () => {
  it("throws on blank input", () => {
    expect(() => expectVerbatim("  ", "abc")).toThrow(VerificationInputEmptyError);
    expect(() => expectVerbatim("abc", "\n")).toThrow(
      "Cannot verify against an empty original text.",
    );
  });

  it("returns the check result otherwise", () => {
    expect(expectVerbatim("brown fox", "The brown fox.").isVerbatim).toBe(true);
  });
});
