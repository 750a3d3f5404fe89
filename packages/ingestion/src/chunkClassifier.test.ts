import { describe, expect, it } from "vitest";
import { classifyChunk } from "./chunkClassifier.js";

describe("classifyChunk", () => {
  it.each([
    ['"Confidential Information" means any non-public data.', "definition"],
    ["Either party may terminate this Agreement on 30 days notice.", "termination"],
    ["Severance: If terminated without cause, Employee receives three (3) months base salary.", "termination"],
    ["The Company pays a signing bonus of $5,000.", "compensation"],
    ["Employee shall keep all trade secrets confidential.", "confidentiality"],
    ["This Agreement is governed by the laws of Delaware.", "governing_law"],
    ["Employee shall devote full working time to the Company.", "obligation"],
    ["Employee may work remotely two days per week.", "permission"],
    ["This page intentionally left blank.", "general"],
  ] as const)("%s -> %s", (text, expected) => {
    expect(classifyChunk(text)).toBe(expected);
  });
});
