const CANONICAL_ROMAN =
  /^(?=[MDCLXVI])M{0,4}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/i;

const ROMAN_VALUES: Readonly<Record<string, number>> = {
  I: 1,
  V: 5,
  X: 10,
  L: 50,
  C: 100,
  D: 500,
  M: 1000,
};

const INT_TO_ROMAN: ReadonlyArray<readonly [number, string]> = [
  [1000, "M"],
  [900, "CM"],
  [500, "D"],
  [400, "CD"],
  [100, "C"],
  [90, "XC"],
  [50, "L"],
  [40, "XL"],
  [10, "X"],
  [9, "IX"],
  [5, "V"],
  [4, "IV"],
  [1, "I"],
];

/** Canonical forms only: "IV" passes, "IIII" and "VV" do not. */
export function isRomanNumeral(value: string): boolean {
  return CANONICAL_ROMAN.test(value);
}

/** Returns -1 for characters outside the numeral alphabet. */
export function romanToInt(value: string): number {
  let total = 0;
  let prev = 0;
  for (const char of [...value.toUpperCase()].reverse()) {
    const current = ROMAN_VALUES[char];
    if (current === undefined) return -1;
    total += current >= prev ? current : -current;
    prev = current;
  }
  return total;
}

export function intToRoman(value: number): string {
  if (!Number.isInteger(value) || value < 1 || value > 4999) {
    throw new RangeError(`Cannot write ${value} as a Roman numeral.`);
  }
  let remaining = value;
  let out = "";
  for (const [amount, symbol] of INT_TO_ROMAN) {
    while (remaining >= amount) {
      out += symbol;
      remaining -= amount;
    }
  }
  return out;
}
