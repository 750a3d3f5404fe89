import type { IntentType } from "@lexrag/core";
import { defaultAnalyzer, type QueryAnalyzer } from "@lexrag/retrieval";

export type QueryType =
  | "definition"
  | "entity_identification"
  | "obligation_inquiry"
  | "rights_inquiry"
  | "conceptual_overview"
  | "general";

export type RetrievalApproach = "iterative" | "traditional";

export type QueryPlan = {
  query: string;
  queryType: QueryType;
  recommendedApproach: RetrievalApproach;
  estimatedIterations: number;
  intent: IntentType;
  keyTerms: string[];
};

const QUERY_TYPE_MARKERS: ReadonlyArray<readonly [QueryType, readonly string[]]> = [
  ["definition", ["what is", "define", "definition", "meaning"]],
  ["entity_identification", ["who are", "who is", "parties", "stakeholders"]],
  ["obligation_inquiry", ["obligations", "requirements", "must", "shall"]],
  ["rights_inquiry", ["rights", "permissions", "allowed", "can"]],
  ["conceptual_overview", ["subject", "topic", "about", "main", "key"]],
];

const ITERATIVE_TYPES: ReadonlySet<QueryType> = new Set([
  "conceptual_overview",
  "general",
  "entity_identification",
]);

export function classifyQueryType(query: string): QueryType {
  const words = ` ${query.toLowerCase().replace(/[^\w\s]/g, " ").split(/\s+/).join(" ")} `;
  for (const [type, markers] of QUERY_TYPE_MARKERS) {
    if (markers.some((m) => words.includes(` ${m} `))) return type;
  }
  return "general";
}

export function estimateIterations(type: QueryType): number {
  if (type === "conceptual_overview" || type === "general") return 3;
  if (type === "entity_identification" || type === "obligation_inquiry") return 2;
  return 1;
}

/**
 * Describes a question for display. `recommendedApproach` is advisory only: the orchestrator
 * always runs its iterative loop, and "traditional" just marks questions a single round should
 * answer.
 */
export function planQuery(query: string, analyzer: QueryAnalyzer = defaultAnalyzer): QueryPlan {
  const queryType = classifyQueryType(query);
  const analysis = analyzer.analyze(query);

  return {
    query,
    queryType,
    recommendedApproach: ITERATIVE_TYPES.has(queryType) ? "iterative" : "traditional",
    estimatedIterations: estimateIterations(queryType),
    intent: analysis.intent.type,
    keyTerms: analysis.keyTerms,
  };
}
