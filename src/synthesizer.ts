import type { AgentResponse, SpecialistIntent, WellnessIntent } from "./agents/types.js";

export const DISCLAIMER =
  "This is educational wellness guidance, not medical advice. Consult healthcare professionals for medical concerns.";

const MIN_CONFIDENCE = 0.65;
const GENERAL_SECTION_CONFIDENCE = 0.7;
const PRIMARY_RECOMMENDATION_LIMIT = 7;
const DEDUPE_PREFIX_LENGTH = 50;
const WRAP_WIDTH = 80;

interface SectionTemplate {
  title: string;
  queryLabel: string;
  bodyLabel: string;
  emptyBody: string;
  excerptLength: number;
  listLabel: string;
  listLimit: number;
  numbered: boolean;
  noteLabel: string;
  note: string;
}

const TEMPLATES: Record<SpecialistIntent, SectionTemplate> = {
  symptom: {
    title: "Symptom Assessment",
    queryLabel: "Your concern",
    bodyLabel: "Initial Assessment",
    emptyBody: "Unable to assess.",
    excerptLength: 300,
    listLabel: "Key Recommendations",
    listLimit: 4,
    numbered: true,
    noteLabel: "Important Note",
    note: "This is general wellness perspective. If symptoms persist, worsen, or are severe, please consult a healthcare provider."
  },
  lifestyle: {
    title: "Lifestyle & Wellness Guidance",
    queryLabel: "Your question",
    bodyLabel: "Recommended Approach",
    emptyBody: "Unable to provide guidance.",
    excerptLength: 250,
    listLabel: "Action Items",
    listLimit: 5,
    numbered: false,
    noteLabel: "Implementation Strategy",
    note: "Start with 1-2 recommendations that resonate most with you. Build momentum gradually."
  },
  diet: {
    title: "Nutrition & Diet Guidance",
    queryLabel: "Your question",
    bodyLabel: "Nutritional Perspective",
    emptyBody: "No nutrition guidance available.",
    excerptLength: 250,
    listLabel: "Food Suggestions",
    listLimit: 5,
    numbered: false,
    noteLabel: "Dietary Note",
    note: "For specific medical dietary needs, consult a registered dietitian."
  },
  fitness: {
    title: "Fitness & Exercise Guidance",
    queryLabel: "Your question",
    bodyLabel: "Exercise Recommendation",
    emptyBody: "No exercise guidance available.",
    excerptLength: 250,
    listLabel: "Suggested Activities",
    listLimit: 5,
    numbered: false,
    noteLabel: "Safety Note",
    note: "Start gradually and listen to your body. Stop if you experience pain. Consult a healthcare provider before starting new programs."
  }
};

export const FALLBACK_GUIDANCE: Record<WellnessIntent, string> = {
  symptom: "Unable to assess symptoms at this time. Please consult a healthcare provider.",
  lifestyle: "Unable to provide lifestyle guidance. Consider consulting a wellness coach.",
  diet: "Unable to provide nutrition guidance. Consult a registered dietitian.",
  fitness: "Unable to provide fitness guidance. Consult a fitness professional.",
  general: "Unable to process your query. Please rephrase and try again."
};

export interface Synthesis {
  responses: AgentResponse[];
  guidance: string;
  primaryRecommendations: string[];
  disclaimer: string;
}

/** Greedy word wrap; runs of whitespace collapse to a single space. */
export function wrapText(text: string, width = WRAP_WIDTH): string {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines.join("\n");
}

export function excerpt(content: string, length: number): string {
  return content.length > length ? `${content.slice(0, length).trimEnd()}...` : content;
}

/**
 * Deduplicates recommendations across agents, comparing the first 50
 * lower-cased characters and keeping agent order.
 */
export function unifyRecommendations(responses: AgentResponse[], limit: number): string[] {
  const seen = new Set<string>();
  const unified: string[] = [];
  for (const response of responses) {
    for (const recommendation of response.recommendations) {
      const key = recommendation.toLowerCase().slice(0, DEDUPE_PREFIX_LENGTH);
      if (!seen.has(key)) {
        seen.add(key);
        unified.push(recommendation);
      }
    }
  }
  return unified.slice(0, limit);
}

export class ResponseSynthesizer {
  synthesize(query: string, intent: WellnessIntent, agentResponses: AgentResponse[]): Synthesis {
    const confident = agentResponses.filter((response) => response.confidence >= MIN_CONFIDENCE);
    const responses = confident.length ? confident : agentResponses;
    return {
      responses,
      guidance: this.compose(intent, responses, query),
      primaryRecommendations: unifyRecommendations(responses, PRIMARY_RECOMMENDATION_LIMIT),
      disclaimer: DISCLAIMER
    };
  }

  private compose(intent: WellnessIntent, responses: AgentResponse[], query: string): string {
    if (!responses.length) {
      return FALLBACK_GUIDANCE[intent];
    }
    if (intent === "general") {
      return this.composeGeneral(responses, query);
    }
    return this.composeSpecialist(TEMPLATES[intent], responses[0], query);
  }

  private composeSpecialist(template: SectionTemplate, primary: AgentResponse, query: string): string {
    const body = primary.content.trim() ? wrapText(excerpt(primary.content, template.excerptLength)) : template.emptyBody;
    const items = primary.recommendations
      .slice(0, template.listLimit)
      .map((recommendation, index) => (template.numbered ? `${index + 1}. ${recommendation}` : `• ${recommendation}`));
    return [
      `## ${template.title}`,
      "",
      `**${template.queryLabel}:** ${query}`,
      "",
      `**${template.bodyLabel}:**`,
      body,
      "",
      `**${template.listLabel}:**`,
      ...items,
      "",
      `**${template.noteLabel}:**`,
      template.note
    ].join("\n");
  }

  private composeGeneral(responses: AgentResponse[], query: string): string {
    const lines = ["## Comprehensive Wellness Perspective", "", `**Your question:** ${query}`, "", "**Multi-Dimensional Assessment:**"];
    for (const response of responses.slice(0, 4)) {
      if (response.confidence > GENERAL_SECTION_CONFIDENCE) {
        lines.push("", `**${response.agentName}:**`, wrapText(excerpt(response.content, 200)));
      }
    }
    lines.push("", "**Integrated Recommendations:**");
    unifyRecommendations(responses, 6).forEach((recommendation, index) => {
      lines.push(`${index + 1}. ${recommendation}`);
    });
    return lines.join("\n");
  }
}
