import { decode } from "html-entities";
import { VerificationInputEmptyError } from "~/lib/errors";
import type { VerificationResult } from "~/lib/types";

// A tag starts with a letter or "/": "p < 0.05" is text, not markup.
const TAG = /<\/?[a-zA-Z][^>]*>/g;

/**
 * Reduces text to lowercase letters, digits and single spaces so that
 * markup, entities, accents and punctuation do not affect comparison.
 * Order: tags, entities, case, NFKD with combining marks dropped,
 * punctuation, whitespace.
 */
export function normalizeForComparison(text: string): string {
  return decode(text.replace(TAG, ""))
    .toLowerCase()
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * True only when the normalised extraction appears as one contiguous run in
 * the normalised source. Quoting the start and end of a passage while
 * skipping its middle does not count.
 */
export function verifyVerbatim(extracted: string, original: string): VerificationResult {
  if (!extracted || !original) {
    const which =
      !extracted && !original
        ? "Both texts are"
        : !extracted
          ? "The extracted text is"
          : "The original text is";
    return { isVerbatim: false, detail: `${which} empty.` };
  }

  const normExtracted = normalizeForComparison(extracted);
  const normOriginal = normalizeForComparison(original);
  if (!normExtracted || !normOriginal) {
    const which = !normExtracted ? "extracted" : "original";
    return {
      isVerbatim: false,
      detail: `The ${which} text has no letters or digits left after normalisation.`,
    };
  }

  const isVerbatim = normOriginal.includes(normExtracted);
  return {
    isVerbatim,
    detail: isVerbatim
      ? "The extraction is verbatim."
      : "The extraction is NOT verbatim: it does not appear as one contiguous passage of the original text.",
  };
}

/** Like `verifyVerbatim`, but empty input is an error rather than a failed check. */
export function expectVerbatim(extracted: string, original: string): VerificationResult {
  if (!extracted.trim() || !original.trim()) {
    throw new VerificationInputEmptyError(
      !extracted.trim()
        ? "Cannot verify an empty extraction."
        : "Cannot verify against an empty original text.",
    );
  }
  return verifyVerbatim(extracted, original);
}
