import { describe, expect, it } from "vitest";
import { ConversationMemory, MemoryManager } from "../memory/short_memory.js";

describe("ConversationMemory", () => {
  it("keeps only the newest messages", () => {
    const memory = new ConversationMemory("u1", 3);
    for (const content of ["m1", "m2", "m3", "m4", "m5"]) {
      memory.addMessage("user", content);
    }
    expect(memory.getMessages().map((message) => message.content)).toEqual(["m3", "m4", "m5"]);
  });

  it("formats the last five turns as context", () => {
    const memory = new ConversationMemory("u1");
    ["m1", "m2", "m3", "m4", "m5", "m6", "m7"].forEach((content, index) => {
      memory.addMessage(index % 2 === 0 ? "user" : "assistant", content);
    });
    expect(memory.getContext()).toBe("user: m3\nassistant: m4\nuser: m5\nassistant: m6\nuser: m7");
  });
});

describe("MemoryManager", () => {
  it("evicts the oldest user once full", () => {
    const manager = new MemoryManager({ maxUsers: 2 });
    manager.addUserMessage("a", "hello");
    manager.addUserMessage("b", "hello");
    manager.addUserMessage("c", "hello");
    expect(manager.has("a")).toBe(false);
    expect(manager.has("b")).toBe(true);
    expect(manager.has("c")).toBe(true);
    expect(manager.size).toBe(2);
  });

  it("returns empty context for unknown users without creating memory", () => {
    const manager = new MemoryManager();
    expect(manager.getConversationContext("ghost")).toBe("");
    expect(manager.has("ghost")).toBe(false);
  });

  it("reports memory statistics", () => {
    const manager = new MemoryManager();
    manager.addUserMessage("u1", "hi");
    manager.updateUserContext("u1", { goal: "sleep" });
    expect(manager.getMemoryStats("u1")).toEqual({
      user_id: "u1",
      message_count: 1,
      context_keys: ["goal"],
      last_message: { role: "user", content: "hi" }
    });
  });

  it("clears a user's memory", () => {
    const manager = new MemoryManager();
    manager.addAssistantMessage("u1", "hello");
    expect(manager.clearMemory("u1")).toBe(true);
    expect(manager.clearMemory("u1")).toBe(false);
    expect(manager.has("u1")).toBe(false);
  });
});
