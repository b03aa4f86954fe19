import type { BaseMessage } from "@langchain/core/messages";

/**
 * Flattens a chat model reply into plain text. Providers may return either a
 * string or a list of content parts.
 */
export function extractText(message: BaseMessage): string {
  const content = message.content;
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((chunk) => {
        if (typeof chunk === "string") {
          return chunk;
        }
        if ("text" in chunk && typeof chunk.text === "string") {
          return chunk.text;
        }
        return "";
      })
      .join("")
      .trim();
  }
  return "";
}
