export type ComparisonWinner = "A" | "B" | "Tie";
export type QualityCriterion = "completeness" | "format" | "consistency";
export type OutputFormat = "text" | "json";
