export type MessageRole = "user" | "assistant";

export interface MemoryMessage {
  role: MessageRole;
  content: string;
}

export interface MemoryStats {
  user_id: string;
  message_count: number;
  context_keys: string[];
  last_message: MemoryMessage | null;
}

const CONTEXT_WINDOW = 5;

export class ConversationMemory {
  private messages: MemoryMessage[] = [];
  readonly context: Record<string, unknown> = {};

  constructor(
    readonly userId: string,
    private readonly maxMessages = 20
  ) {}

  addMessage(role: MessageRole, content: string): void {
    this.messages.push({ role, content });
    if (this.messages.length > this.maxMessages) {
      this.messages = this.messages.slice(-this.maxMessages);
    }
  }

  /** Last few turns as `role: content` lines, the form agents receive as history. */
  getContext(): string {
    return this.messages
      .slice(-CONTEXT_WINDOW)
      .map((message) => `${message.role}: ${message.content}`)
      .join("\n");
  }

  getMessages(): readonly MemoryMessage[] {
    return this.messages;
  }
}

export interface MemoryManagerOptions {
  maxUsers?: number;
  maxMessages?: number;
}

/**
 * In-process conversation store keyed by user id. When full, the user whose
 * memory was created first is evicted.
 */
export class MemoryManager {
  private readonly store = new Map<string, ConversationMemory>();
  private readonly maxUsers: number;
  private readonly maxMessages: number;

  constructor({ maxUsers = 100, maxMessages = 20 }: MemoryManagerOptions = {}) {
    this.maxUsers = maxUsers;
    this.maxMessages = maxMessages;
  }

  getOrCreateMemory(userId: string): ConversationMemory {
    const existing = this.store.get(userId);
    if (existing) {
      return existing;
    }
    if (this.store.size >= this.maxUsers) {
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        this.store.delete(oldest.value);
      }
    }
    const memory = new ConversationMemory(userId, this.maxMessages);
    this.store.set(userId, memory);
    return memory;
  }

  has(userId: string): boolean {
    return this.store.has(userId);
  }

  addUserMessage(userId: string, message: string): void {
    this.getOrCreateMemory(userId).addMessage("user", message);
  }

  addAssistantMessage(userId: string, message: string): void {
    this.getOrCreateMemory(userId).addMessage("assistant", message);
  }

  /** Empty string for a user with no history; does not create a memory. */
  getConversationContext(userId: string): string {
    return this.store.get(userId)?.getContext() ?? "";
  }

  updateUserContext(userId: string, context: Record<string, unknown>): void {
    Object.assign(this.getOrCreateMemory(userId).context, context);
  }

  clearMemory(userId: string): boolean {
    return this.store.delete(userId);
  }

  getMemoryStats(userId: string): MemoryStats {
    const memory = this.getOrCreateMemory(userId);
    const messages = memory.getMessages();
    return {
      user_id: userId,
      message_count: messages.length,
      context_keys: Object.keys(memory.context),
      last_message: messages.length ? messages[messages.length - 1] : null
    };
  }

  get size(): number {
    return this.store.size;
  }
}
