import { planQuery } from "@lexrag/rag";
import { buildSearchPatterns, defaultAnalyzer } from "@lexrag/retrieval";
import { getArg } from "./cliArgs.js";

const q = getArg("q");

if (!q) {
  console.error('Usage: npm run analyze -- --q "..."');
  process.exit(1);
}

const analysis = defaultAnalyzer.analyze(q);
const plan = planQuery(q);

console.log("[analyze] plan", {
  queryType: plan.queryType,
  recommendedApproach: plan.recommendedApproach,
  estimatedIterations: plan.estimatedIterations,
});

console.log("[analyze] intent", analysis.intent);
console.log("[analyze] phrases", analysis.phrases);

console.log("\n=== SEARCH TERMS ===\n");
for (const t of analysis.searchTerms) {
  const syn = t.synonyms.length > 0 ? `  synonyms: ${t.synonyms.join(", ")}` : "";
  console.log(`${t.term.padEnd(24)} weight=${t.weight.toFixed(1)} ${t.category}${syn}`);
}

console.log("\n=== PATTERNS ===\n");
for (const p of buildSearchPatterns(analysis)) {
  const payload =
    p.kind === "exact_phrase"
      ? p.phrase
      : p.kind === "core_concepts"
        ? p.concepts.join(", ")
        : p.kind === "synonym_expansion"
          ? p.terms.join(", ")
          : p.keywords.join(", ");
  console.log(`${p.kind.padEnd(18)} ${p.weight.toFixed(1)}  ${payload}`);
}
