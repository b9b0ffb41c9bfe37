import type { RemapReport, ToolFailure } from "./tools/types.js";
import type { ValidationIssue } from "./types.js";

function supportsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stderr && process.stderr.isTTY);
}

function colorize(text: string, color: "red" | "green"): string {
  if (!supportsColor()) return text;
  const RED = "\x1b[31m";
  const GREEN = "\x1b[32m";
  const RESET = "\x1b[0m";
  const code = color === "red" ? RED : GREEN;
  return `${code}${text}${RESET}`;
}

export function computeStatus(result: RemapReport | ToolFailure): "Success" | "No changes" | "Failed" {
  if (!("outputPath" in result)) return "Failed";
  return result.totalReplacements > 0 ? "Success" : "No changes";
}

/**
 * One line per issue: `ERROR [rule] message (row 3)` / `WARN [rule] message (at path)`
 */
export function formatIssue(issue: ValidationIssue): string {
  const level = issue.severity === "error" ? "ERROR" : "WARN";
  const where = issue.rowIndex !== undefined
    ? ` (row ${issue.rowIndex})`
    : issue.location !== undefined ? ` (at ${issue.location})` : "";
  return `${level} [${issue.ruleId}] ${issue.message}${where}`;
}

export function renderSummaryBox(result: RemapReport | ToolFailure): string {
  const status = computeStatus(result);
  const content = ["SUMMARY", `Status: ${status}`];

  if ("outputPath" in result) {
    const applied = result.replacements.filter((r) => r.count > 0).length;
    content.push(
      `Mappings applied: ${applied}/${result.replacements.length}`,
      `Replacements: ${result.totalReplacements}`,
      `Fields renamed: ${result.renamedFields.length}`,
      `Warnings: ${result.issues.length}`,
      `Output: ${result.outputPath}`
    );
  } else {
    content.push(`Error: ${result.error.code}`, `Issues: ${result.issues.length}`);
  }

  // Compute max content width and render a neatly padded box
  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map((line) => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  // Colour only for TTYs; honor NO_COLOR
  return colorize(box, status === "Failed" ? "red" : "green");
}
