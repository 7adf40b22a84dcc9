#!/usr/bin/env -S npx tsx
//
// Dev script: run the verbatim and panel-sequence checks over a JSON file
// of extracted figures.
//
// Usage:
//   npm run verify -- <extractions.json> [-o report.txt]
//
// Input shape: { "source": "...", "figures": [{ "label", "caption", "panels": [] }] }

import { parseArgs } from "node:util";
import { readFile, writeFile } from "node:fs/promises";
import { checkExtractions, ExtractionFileSchema } from "../src/lib/verification/report";

const { positionals, values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    out: { type: "string", short: "o" },
  },
  allowPositionals: true,
});

const inputPath = positionals[0];
if (!inputPath) {
  console.error("Usage: npm run verify -- <extractions.json> [-o report.txt]");
  process.exit(1);
}

console.log(`Reading ${inputPath}...`);
const parsed = ExtractionFileSchema.safeParse(JSON.parse(await readFile(inputPath, "utf8")));
if (!parsed.success) {
  console.error(`Invalid extraction file:`);
  for (const issue of parsed.error.issues) {
    console.error(`  - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  process.exit(1);
}

const report = checkExtractions(parsed.data);
console.log(`  ${report.checked} figure(s) checked`);

if (values.out) {
  await writeFile(values.out, report.text ?? "All checks passed.\n");
  console.log(`Report written to ${values.out}`);
}

if (report.text) {
  console.error(`\n${report.text}`);
  process.exit(1);
}
console.log("All checks passed.");
