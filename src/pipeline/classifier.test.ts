import { describe, it, expect } from "vitest";
import { isEducational, normalizeForClassification } from "./classifier";

describe("normalizeForClassification", () => {
  it("should fold separators and collapse whitespace", () => {
    expect(normalizeForClassification("A Step-by-Step  Guide", "from_scratch/now\n")).toBe(
      "a step by step guide from scratch now",
    );
  });
});

describe("isEducational", () => {
  it.each([
    ["A Survey of Diffusion Models", ""],
    ["Tutorial on Kernel Methods", ""],
    ["Graph Learning", "We review recent work on graph learning."],
    ["Lecture Notes on Optimal Transport", ""],
    ["Transformers for Beginners", ""],
    ["How-To Train Your Agent", ""],
    ["Quantum Computing: a Roadmap", ""],
    ["Deep RL From_Scratch", ""],
    ["FUNDAMENTALS OF CAUSAL INFERENCE", ""],
  ])("should tag %j as educational", (title, summary) => {
    expect(isEducational(title, summary)).toBe(true);
  });

  it.each([
    ["Scaling Laws for Sparse Mixtures", "We train larger models."],
    ["Reviewer Assignment via Matching", "We match papers."],
    ["Surveyor Robots in Mines", ""],
    ["Guidebook-free Navigation", ""],
  ])("should not tag %j", (title, summary) => {
    expect(isEducational(title, summary)).toBe(false);
  });
});
