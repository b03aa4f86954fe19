import { describe, expect, it } from "vitest";
import { assessSafety, EMERGENCY_MESSAGES } from "../safety.js";

describe("assessSafety", () => {
  it("flags chest pain as a medical emergency", () => {
    expect(assessSafety("I have chest pain and my left arm is numb")).toEqual({
      requiresEmergency: true,
      category: "medical",
      matched: "chest pain",
      message: EMERGENCY_MESSAGES.medical
    });
  });

  it("normalizes typographic apostrophes", () => {
    const result = assessSafety("I can’t breathe properly");
    expect(result).toMatchObject({ requiresEmergency: true, category: "medical", matched: "can't breathe" });
  });

  it.each([
    ["I've been feeling suicidal lately", "suicidal"],
    ["I want to hurt myself", "hurt myself"],
    ["Sometimes I think about self-harm", "self-harm"]
  ])("flags %j as a mental health crisis", (query, matched) => {
    expect(assessSafety(query)).toMatchObject({ requiresEmergency: true, category: "mental_health", matched });
  });

  it("prefers the crisis response when both categories match", () => {
    expect(assessSafety("I feel suicidal and have chest pain")).toMatchObject({ category: "mental_health" });
  });

  it("points crisis messages at a crisis line", () => {
    expect(EMERGENCY_MESSAGES.mental_health).toContain("988");
  });

  it.each([
    "Breaststroke workout for beginners",
    "How do I improve my backstroke technique?",
    "Are suicide sprints a good drill?",
    "How many suicide runs should I do at practice?"
  ])("does not flag the exercise question %j", (query) => {
    expect(assessSafety(query)).toEqual({ requiresEmergency: false });
  });

  it("still flags emergency words next to a benign phrase", () => {
    expect(assessSafety("Suicide sprints made me think about suicide")).toMatchObject({
      category: "mental_health",
      matched: "suicide"
    });
  });

  it("matches plural forms of a phrase", () => {
    expect(assessSafety("I keep having seizures")).toMatchObject({ category: "medical", matched: "seizure" });
  });

  it("lets ordinary wellness questions through", () => {
    expect(assessSafety("How do I relax after work?")).toEqual({ requiresEmergency: false });
  });
});
