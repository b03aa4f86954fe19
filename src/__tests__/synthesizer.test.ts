import { describe, expect, it } from "vitest";
import type { AgentResponse } from "../agents/types.js";
import {
  DISCLAIMER,
  excerpt,
  FALLBACK_GUIDANCE,
  ResponseSynthesizer,
  unifyRecommendations,
  wrapText
} from "../synthesizer.js";

function response(overrides: Partial<AgentResponse>): AgentResponse {
  return {
    agentName: "Symptom Assessment",
    intent: "symptom",
    content: "Short note.",
    confidence: 0.85,
    recommendations: [],
    ...overrides
  };
}

describe("text helpers", () => {
  it("collapses whitespace and wraps at the given width", () => {
    expect(wrapText("a  b\n c")).toBe("a b c");
    expect(wrapText("one two three", 7)).toBe("one two\nthree");
  });

  it("marks truncated excerpts", () => {
    expect(excerpt("abcdef", 3)).toBe("abc...");
    expect(excerpt("abc", 3)).toBe("abc");
  });

  it("deduplicates recommendations case-insensitively in agent order", () => {
    const unified = unifyRecommendations(
      [
        response({ recommendations: ["Drink water daily", "Sleep early"] }),
        response({ agentName: "Lifestyle Coach", recommendations: ["drink water DAILY", "Walk"] })
      ],
      7
    );
    expect(unified).toEqual(["Drink water daily", "Sleep early", "Walk"]);
  });
});

describe("ResponseSynthesizer", () => {
  const synthesizer = new ResponseSynthesizer();

  it("renders the symptom template with at most four numbered items", () => {
    const result = synthesizer.synthesize("I feel tired", "symptom", [
      response({ recommendations: ["a1", "a2", "a3", "a4", "a5"] })
    ]);
    expect(result.guidance).toBe(
      [
        "## Symptom Assessment",
        "",
        "**Your concern:** I feel tired",
        "",
        "**Initial Assessment:**",
        "Short note.",
        "",
        "**Key Recommendations:**",
        "1. a1",
        "2. a2",
        "3. a3",
        "4. a4",
        "",
        "**Important Note:**",
        "This is general wellness perspective. If symptoms persist, worsen, or are severe, please consult a healthcare provider."
      ].join("\n")
    );
    expect(result.primaryRecommendations).toEqual(["a1", "a2", "a3", "a4", "a5"]);
    expect(result.disclaimer).toBe(DISCLAIMER);
  });

  it("bullets specialist recommendations and wraps long content", () => {
    const result = synthesizer.synthesize("How do I sleep better?", "lifestyle", [
      response({
        agentName: "Lifestyle Coach",
        intent: "lifestyle",
        content: "word ".repeat(100),
        confidence: 0.82,
        recommendations: ["Keep a fixed bedtime every night"]
      })
    ]);
    const lines = result.guidance.split("\n");
    expect(lines[0]).toBe("## Lifestyle & Wellness Guidance");
    expect(lines).toContain("• Keep a fixed bedtime every night");
    expect(lines).toContain("word word...");
    expect(lines.every((line) => line.length <= 80 || line.startsWith("Start with"))).toBe(true);
  });

  it("drops low-confidence answers when confident ones exist", () => {
    const result = synthesizer.synthesize("q", "symptom", [
      response({ agentName: "Unsure", confidence: 0.5 }),
      response({ agentName: "Sure", confidence: 0.8 })
    ]);
    expect(result.responses.map((r) => r.agentName)).toEqual(["Sure"]);
  });

  it("keeps every answer when none is confident", () => {
    const result = synthesizer.synthesize("q", "symptom", [
      response({ agentName: "A", confidence: 0.5 }),
      response({ agentName: "B", confidence: 0.6 })
    ]);
    expect(result.responses).toHaveLength(2);
  });

  it("falls back when no agent answered", () => {
    const result = synthesizer.synthesize("q", "diet", []);
    expect(result.guidance).toBe(FALLBACK_GUIDANCE.diet);
    expect(result.primaryRecommendations).toEqual([]);
    expect(result.responses).toEqual([]);
  });

  it("gives general questions a section per confident agent", () => {
    const result = synthesizer.synthesize("Help me be healthier", "general", [
      response({ agentName: "Lifestyle Coach", intent: "lifestyle", confidence: 0.82, recommendations: ["Rest"] }),
      response({ agentName: "Borderline", intent: "diet", confidence: 0.7, recommendations: ["Eat greens"] })
    ]);
    const lines = result.guidance.split("\n");
    expect(lines[0]).toBe("## Comprehensive Wellness Perspective");
    expect(lines).toContain("**Lifestyle Coach:**");
    expect(lines).not.toContain("**Borderline:**");
    expect(lines.slice(-3)).toEqual(["**Integrated Recommendations:**", "1. Rest", "2. Eat greens"]);
  });
});
