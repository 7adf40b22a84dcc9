import { describe, expect, it } from "vitest";
import { InvalidSequenceInputError } from "../src/lib/errors";
import { intToRoman, isRomanNumeral, romanToInt } from "../src/lib/verification/roman";
import {
  cleanLabel,
  expectValidSequence,
  MAX_SEQUENCE_SPAN,
  verifySequence,
} from "../src/lib/verification/sequence";

describe("verifySequence", () => {
  it("reports a gap in uppercase labels and fills it", () => {
    expect(verifySequence(["A", "B", "D", "E"])).toEqual({
      isValid: false,
      fixedSequence: ["A", "B", "C", "D", "E"],
      detail: "Sequence has gaps or is out of order. Fixed sequence: A, B, C, D, E",
    });
  });

  it("accepts a complete Roman run", () => {
    expect(verifySequence(["I", "II", "III", "IV"])).toEqual({
      isValid: true,
      fixedSequence: ["I", "II", "III", "IV"],
      detail: "Sequence is valid.",
    });
  });

  it("rejects non-canonical Roman numerals", () => {
    expect(verifySequence(["I", "II", "IIII"])).toEqual({
      isValid: false,
      fixedSequence: ["I", "II"],
      detail: "Invalid Roman numeral(s) in sequence: IIII",
    });
  });

  it("cleans parentheses, periods and whitespace before checking", () => {
    expect(verifySequence(["(a)", "b.", " c "])).toEqual({
      isValid: true,
      fixedSequence: ["a", "b", "c"],
      detail: "Sequence is valid.",
    });
  });

  it("fills numeric gaps", () => {
    const result = verifySequence(["1", "2", "4"]);
    expect(result.isValid).toBe(false);
    expect(result.fixedSequence).toEqual(["1", "2", "3", "4"]);
    expect(result.detail).toBe("Sequence has gaps or is out of order. Fixed sequence: 1, 2, 3, 4");
  });

  it("treats out-of-order letters as invalid", () => {
    const result = verifySequence(["b", "a", "c"]);
    expect(result.isValid).toBe(false);
    expect(result.fixedSequence).toEqual(["a", "b", "c"]);
  });

  it("compares Roman labels as a set, ignoring order", () => {
    expect(verifySequence(["II", "I", "III"])).toEqual({
      isValid: true,
      fixedSequence: ["I", "II", "III"],
      detail: "Sequence is valid.",
    });
  });

  it("reports a Roman gap", () => {
    expect(verifySequence(["I", "III"])).toEqual({
      isValid: false,
      fixedSequence: ["I", "II", "III"],
      detail: "Sequence has gaps. Fixed sequence: I, II, III",
    });
  });

  it("lists labels that do not belong to the detected alphabet", () => {
    expect(verifySequence(["A", "BB", "C"])).toEqual({
      isValid: false,
      fixedSequence: ["A", "B", "C"],
      detail: "Labels are not valid uppercase letters: BB",
    });
  });

  it("classifies by the first label", () => {
    expect(verifySequence(["I", "J"])).toEqual({
      isValid: false,
      fixedSequence: ["I"],
      detail: "Invalid Roman numeral(s) in sequence: J",
    });
  });

  it("refuses to expand a run longer than the span limit", () => {
    expect(verifySequence(["1", "2", "50000000"])).toEqual({
      isValid: false,
      fixedSequence: ["1", "2", "50000000"],
      detail: `Sequence spans 50000000 positions, more than the ${MAX_SEQUENCE_SPAN} allowed.`,
    });
  });

  it("expands a run right at the span limit", () => {
    const result = verifySequence(["1", String(MAX_SEQUENCE_SPAN)]);
    expect(result.isValid).toBe(false);
    expect(result.fixedSequence).toHaveLength(MAX_SEQUENCE_SPAN);
  });

  it("rejects numbers beyond safe integer precision", () => {
    expect(verifySequence(["1", "99999999999999999999"])).toEqual({
      isValid: false,
      fixedSequence: ["1"],
      detail: "Labels are not valid numbers: 99999999999999999999",
    });
  });

  it("rejects lowercase numerals once an uppercase label set the alphabet", () => {
    expect(verifySequence(["I", "ii", "III"])).toEqual({
      isValid: false,
      fixedSequence: ["I", "II", "III"],
      detail: "Invalid Roman numeral(s) in sequence: ii",
    });
  });

  it("handles empty and unclassifiable input without throwing", () => {
    expect(verifySequence([])).toEqual({
      isValid: false,
      fixedSequence: [],
      detail: "No labels provided.",
    });
    expect(verifySequence(["Fig1"])).toEqual({
      isValid: false,
      fixedSequence: ["Fig1"],
      detail: "Unable to determine sequence type from labels.",
    });
  });
});

describe("expectValidSequence", () => {
  it("throws on input it cannot classify", () => {
    expect(() => expectValidSequence([])).toThrow(InvalidSequenceInputError);
    expect(() => expectValidSequence(["?"])).toThrow(
      'Unable to determine sequence type from labels: first label is "?".',
    );
  });

  it("returns the check result otherwise", () => {
    expect(expectValidSequence(["A", "C"]).isValid).toBe(false);
  });
});

describe("cleanLabel", () => {
  it("strips wrapping and trailing punctuation", () => {
    expect(cleanLabel(" (iv). ")).toBe("iv");
  });
});

describe("roman numerals", () => {
  it("converts in both directions", () => {
    expect(romanToInt("XIV")).toBe(14);
    expect(romanToInt("mcmxc")).toBe(1990);
    expect(intToRoman(1994)).toBe("MCMXCIV");
  });

  it("flags characters outside the numeral alphabet", () => {
    expect(romanToInt("ABC")).toBe(-1);
  });

  it("accepts canonical forms only", () => {
    expect(isRomanNumeral("iv")).toBe(true);
    expect(isRomanNumeral("IIII")).toBe(false);
    expect(isRomanNumeral("VV")).toBe(false);
    expect(isRomanNumeral("")).toBe(false);
  });

  it("rejects values it cannot write", () => {
    expect(() => intToRoman(0)).toThrow(RangeError);
    expect(() => intToRoman(5000)).toThrow(RangeError);
  });
});
