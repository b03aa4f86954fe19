export type SafetyCategory = "mental_health" | "medical";

export type SafetyAssessment =
  | { requiresEmergency: false }
  | {
      requiresEmergency: true;
      category: SafetyCategory;
      matched: string;
      message: string;
    };

// Checked in this order: a crisis phrase wins over a medical one.
const EMERGENCY_PHRASES: ReadonlyArray<{ category: SafetyCategory; phrases: readonly string[] }> = [
  {
    category: "mental_health",
    phrases: [
      "suicidal",
      "suicide",
      "kill myself",
      "end my life",
      "want to die",
      "self-harm",
      "self harm",
      "hurt myself",
      "harm myself"
    ]
  },
  {
    category: "medical",
    phrases: [
      "chest pain",
      "can't breathe",
      "cannot breathe",
      "difficulty breathing",
      "trouble breathing",
      "severe bleeding",
      "loss of consciousness",
      "passed out",
      "seizure",
      "stroke",
      "heart attack"
    ]
  }
];

export const EMERGENCY_MESSAGES: Record<SafetyCategory, string> = {
  mental_health:
    "🚨 If you are thinking about harming yourself, please reach out right now: call or text 988 (Suicide & Crisis Lifeline, US) " +
    "or call your local emergency number (911). You do not have to go through this alone.",
  medical: "🚨 CRITICAL: Seek emergency medical help immediately (911)"
};

// Drill and exercise names that contain emergency words.
const BENIGN_PHRASES = [/\bsuicide (?:sprints?|runs?|drills?|shuttles?)\b/g];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-phrase match with an optional plural, so "stroke" does not fire on "backstroke".
const PHRASE_PATTERNS = EMERGENCY_PHRASES.map(({ category, phrases }) => ({
  category,
  patterns: phrases.map((phrase) => ({ phrase, pattern: new RegExp(`\\b${escapeRegExp(phrase)}s?\\b`) }))
}));

function normalize(query: string): string {
  let text = query.toLowerCase().replace(/[‘’ʼ]/g, "'");
  for (const benign of BENIGN_PHRASES) {
    text = text.replace(benign, " ");
  }
  return text;
}

export function assessSafety(query: string): SafetyAssessment {
  const text = normalize(query);
  for (const { category, patterns } of PHRASE_PATTERNS) {
    const hit = patterns.find(({ pattern }) => pattern.test(text));
    if (hit) {
      return { requiresEmergency: true, category, matched: hit.phrase, message: EMERGENCY_MESSAGES[category] };
    }
  }
  return { requiresEmergency: false };
}
