import { describe, expect, it } from "vitest";
import { identifyIntent, INTENT_KEYWORDS, scoreIntents } from "../agents/intents.js";

describe("keyword intent detection", () => {
  it("loads a keyword list for every specialist", () => {
    expect(INTENT_KEYWORDS.symptom).toContain("headache");
    expect(INTENT_KEYWORDS.lifestyle).toContain("sleep");
    expect(INTENT_KEYWORDS.diet).toContain("protein");
    expect(INTENT_KEYWORDS.fitness).toContain("workout");
  });

  it("counts keyword hits per intent", () => {
    expect(scoreIntents("I feel tired all the time")).toEqual({ symptom: 2, lifestyle: 1, diet: 0, fitness: 0 });
  });

  it.each([
    ["I feel tired all the time", "symptom"],
    ["How can I reduce stress and sleep better?", "lifestyle"],
    ["What should I eat for more protein?", "diet"],
    ["Best workout plan to build muscle", "fitness"],
    ["I'm eating late most nights", "diet"],
    ["Tell me something nice", "general"]
  ])("classifies %j as %s", (query, intent) => {
    expect(identifyIntent(query)).toBe(intent);
  });

  it("breaks ties in specialist order", () => {
    expect(identifyIntent("I feel stressed")).toBe("symptom");
  });

  it("matches keywords only at the start of a word", () => {
    expect(identifyIntent("That was a great day")).toBe("general");
  });
});
