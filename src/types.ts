export type RuleSpec =
  | string
  | {
      and?: RuleSpec[];
      or?: RuleSpec[];
      not?: RuleSpec;
    };

export interface RuleSetSpec {
  rules: Record<string, RuleSpec>;
}

export interface RuleSetDiagnostics {
  warnings: string[];
  errors: string[];
}

export interface RuleSetStats {
  totalRules: number;
  evaluatedRules: number;
  matchedRules: number;
}

export interface RuleSetResult {
  results: Record<string, boolean>;
  stats: RuleSetStats;
  diagnostics: RuleSetDiagnostics;
}

export type OutputFormat = "json" | "jsonl" | "yaml";
