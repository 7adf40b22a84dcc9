import { InvalidSequenceInputError } from "~/lib/errors";
import type { SequenceResult } from "~/lib/types";
import { intToRoman, isRomanNumeral, romanToInt } from "./roman";

const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
/** Roman tokens that win classification over single uppercase letters. */
const ROMAN_TOKENS: ReadonlySet<string> = new Set([
  "I", "II", "III", "IV", "V", "VI", "VII", "VIII", "IX", "X",
]);

/** Longest min-to-max run that will be expanded into a fixed sequence. */
export const MAX_SEQUENCE_SPAN = 1000;

export type SequenceKind = "roman" | "uppercase" | "lowercase" | "numeric";

/** Drops parentheses, trailing periods and surrounding whitespace: "(b)." -> "b". */
export function cleanLabel(label: string): string {
  return label.replace(/[()]/g, "").trim().replace(/\.+$/, "").trim();
}

export function classifySequence(firstLabel: string): SequenceKind | null {
  if (ROMAN_TOKENS.has(firstLabel)) return "roman";
  if (/^[A-Z]$/.test(firstLabel)) return "uppercase";
  if (/^[a-z]$/.test(firstLabel)) return "lowercase";
  if (/^\d+$/.test(firstLabel)) return "numeric";
  return null;
}

function range(start: number, end: number): number[] {
  const out: number[] = [];
  for (let n = start; n <= end; n++) out.push(n);
  return out;
}

function joined(labels: string[]): string {
  return labels.join(", ");
}

function spanExceeded(labels: string[], min: number, max: number): SequenceResult | null {
  const span = max - min + 1;
  if (span <= MAX_SEQUENCE_SPAN) return null;
  return {
    isValid: false,
    fixedSequence: labels,
    detail: `Sequence spans ${span} positions, more than the ${MAX_SEQUENCE_SPAN} allowed.`,
  };
}

function gapResult(labels: string[], expected: string[]): SequenceResult {
  const isValid =
    labels.length === expected.length && labels.every((label, i) => label === expected[i]);
  return {
    isValid,
    fixedSequence: expected,
    detail: isValid
      ? "Sequence is valid."
      : `Sequence has gaps or is out of order. Fixed sequence: ${joined(expected)}`,
  };
}

/**
 * Positions are compared in order: the labels must be exactly the run from
 * the smallest to the largest position.
 */
function verifyPositional(
  labels: string[],
  positionOf: (label: string) => number,
  labelAt: (position: number) => string,
  kindName: string,
): SequenceResult {
  const positions = labels.map(positionOf);
  const known = positions.filter((p) => p >= 0);
  let expected: string[] = [];
  if (known.length > 0) {
    const min = Math.min(...known);
    const max = Math.max(...known);
    const tooLong = spanExceeded(labels, min, max);
    if (tooLong) return tooLong;
    expected = range(min, max).map(labelAt);
  }

  const invalid = labels.filter((_, i) => (positions[i] ?? -1) < 0);
  if (invalid.length > 0) {
    return {
      isValid: false,
      fixedSequence: expected,
      detail: `Labels are not valid ${kindName}: ${joined(invalid)}`,
    };
  }
  return gapResult(labels, expected);
}

function verifyAlphabet(labels: string[], alphabet: string, kindName: string): SequenceResult {
  return verifyPositional(
    labels,
    (label) => (label.length === 1 ? alphabet.indexOf(label) : -1),
    (position) => alphabet.charAt(position),
    kindName,
  );
}

function verifyNumeric(labels: string[]): SequenceResult {
  return verifyPositional(
    labels,
    (label) => {
      if (!/^\d+$/.test(label)) return -1;
      const value = Number.parseInt(label, 10);
      return Number.isSafeInteger(value) ? value : -1;
    },
    (position) => String(position),
    "numbers",
  );
}

/**
 * Roman labels are compared as a set of integers, so order is not checked.
 * Letter and digit labels are compared in order.
 */
function verifyRoman(labels: string[]): SequenceResult {
  // The first label set the alphabet in upper case; "ii" does not belong to it.
  const isValidLabel = (label: string) => label === label.toUpperCase() && isRomanNumeral(label);
  const invalid = labels.filter((label) => !isValidLabel(label));
  const values = labels.filter(isValidLabel).map(romanToInt);
  let expectedValues: number[] = [];
  if (values.length > 0) {
    const min = Math.min(...values);
    const max = Math.max(...values);
    const tooLong = spanExceeded(labels, min, max);
    if (tooLong) return tooLong;
    expectedValues = range(min, max);
  }
  const fixedSequence = expectedValues.map(intToRoman);

  if (invalid.length > 0) {
    return {
      isValid: false,
      fixedSequence,
      detail: `Invalid Roman numeral(s) in sequence: ${joined(invalid)}`,
    };
  }

  const observed = new Set(values);
  const isValid =
    observed.size === expectedValues.length && expectedValues.every((v) => observed.has(v));
  return {
    isValid,
    fixedSequence,
    detail: isValid
      ? "Sequence is valid."
      : `Sequence has gaps. Fixed sequence: ${joined(fixedSequence)}`,
  };
}

/**
 * Checks that panel labels form a gap-free run (A, B, C rather than A, B, D)
 * and proposes the complete run.
 */
export function verifySequence(labels: readonly string[]): SequenceResult {
  if (labels.length === 0) {
    return { isValid: false, fixedSequence: [], detail: "No labels provided." };
  }

  const cleaned = labels.map(cleanLabel);
  const kind = classifySequence(cleaned[0] ?? "");
  switch (kind) {
    case "roman":
      return verifyRoman(cleaned);
    case "uppercase":
      return verifyAlphabet(cleaned, UPPERCASE, "uppercase letters");
    case "lowercase":
      return verifyAlphabet(cleaned, LOWERCASE, "lowercase letters");
    case "numeric":
      return verifyNumeric(cleaned);
    case null:
      return {
        isValid: false,
        fixedSequence: cleaned,
        detail: "Unable to determine sequence type from labels.",
      };
  }
}

/** Like `verifySequence`, but an empty or untyped label list is an error. */
export function expectValidSequence(labels: readonly string[]): SequenceResult {
  if (labels.length === 0) {
    throw new InvalidSequenceInputError("No labels provided.");
  }
  const first = cleanLabel(labels[0] ?? "");
  if (classifySequence(first) === null) {
    throw new InvalidSequenceInputError(
      `Unable to determine sequence type from labels: first label is "${first}".`,
    );
  }
  return verifySequence(labels);
}
