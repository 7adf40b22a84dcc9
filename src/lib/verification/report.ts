import { z } from "zod";
import { expectValidSequence } from "./sequence";
import { expectVerbatim } from "./verbatim";

export const ExtractionFileSchema = z.object({
  source: z.string().describe("Full text the captions were extracted from"),
  figures: z.array(
    z.object({
      label: z.string().describe("Figure label, e.g. 'Figure 2'"),
      caption: z.string().describe("Caption text the model claims to have copied verbatim"),
      panels: z.array(z.string()).describe("Panel labels in the order the model listed them"),
    }),
  ),
});

export type ExtractionFile = z.infer<typeof ExtractionFileSchema>;

interface FigureIssue {
  figure: string;
  check: "caption" | "panels";
  detail: string;
}

export type ExtractionReport = {
  checked: number;
  issues: FigureIssue[];
  /** Human-readable report, or null when every figure passed. */
  text: string | null;
};

/**
 * Runs the verbatim and panel-sequence checks over every figure. Input
 * errors (empty caption, unclassifiable labels) are reported as issues
 * alongside failed checks.
 */
export function checkExtractions(file: ExtractionFile): ExtractionReport {
  const issues: FigureIssue[] = [];

  for (const figure of file.figures) {
    try {
      const caption = expectVerbatim(figure.caption, file.source);
      if (!caption.isVerbatim) {
        issues.push({ figure: figure.label, check: "caption", detail: caption.detail });
      }
    } catch (e) {
      issues.push({
        figure: figure.label,
        check: "caption",
        detail: e instanceof Error ? e.message : String(e),
      });
    }

    try {
      const panels = expectValidSequence(figure.panels);
      if (!panels.isValid) {
        issues.push({ figure: figure.label, check: "panels", detail: panels.detail });
      }
    } catch (e) {
      issues.push({
        figure: figure.label,
        check: "panels",
        detail: e instanceof Error ? e.message : String(e),
      });
    }
  }

  if (issues.length === 0) {
    return { checked: file.figures.length, issues, text: null };
  }

  const lines = [
    `Verification failed: ${issues.length} issue(s) across ${file.figures.length} figure(s).\n`,
  ];
  for (const issue of issues) {
    lines.push(`• ${issue.figure} (${issue.check})`);
    lines.push(`  Problem: ${issue.detail}\n`);
  }
  return { checked: file.figures.length, issues, text: lines.join("\n") };
}
