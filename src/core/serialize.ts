import { stringify as stringifyYaml } from "yaml";

import type { OutputFormat, RuleSetResult } from "../types.js";

export function serializeRuleSetResult(result: RuleSetResult, format: OutputFormat): string {
  if (format === "json") {
    return `${JSON.stringify(
      {
        results: result.results,
        stats: result.stats,
        diagnostics: result.diagnostics,
      },
      null,
      2,
    )}\n`;
  }

  if (format === "jsonl") {
    return Object.entries(result.results)
      .map(([rule, matched]) => `${JSON.stringify({ rule, matched })}\n`)
      .join("");
  }

  if (format === "yaml") {
    return stringifyYaml({
      results: result.results,
      stats: result.stats,
      diagnostics: result.diagnostics,
    });
  }

  throw new Error(`unsupported output format: ${String(format)}`);
}
