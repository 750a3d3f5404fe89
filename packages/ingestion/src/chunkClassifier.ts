import type { ChunkType } from "@lexrag/core";

/** First matching rule wins; anything unmatched is "general". */
const RULES: ReadonlyArray<readonly [ChunkType, RegExp]> = [
  ["definition", /\b(shall mean|means|is defined as|refers to|definitions?)\b/],
  ["termination", /\bterminat|\bseverance\b|\bresign/],
  ["compensation", /\b(salary|compensation|wages?|bonus|remuneration|payment|benefits)\b|\$\s?\d/],
  ["confidentiality", /\bconfidential|\bnon-disclosure\b|\btrade secrets?\b/],
  ["governing_law", /\bgoverning law\b|\bgoverned by\b|\bjurisdiction\b|\bvenue\b/],
  ["obligation", /\b(shall|must|agrees? to|is required to|obligat\w*)\b/],
  ["permission", /\b(may|is entitled to|is permitted to|has the right to)\b/],
];

export function classifyChunk(text: string): ChunkType {
  const t = text.toLowerCase();
  for (const [type, re] of RULES) {
    if (re.test(t)) return type;
  }
  return "general";
}
