// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/conversation/in-memory-conversation.store`
 * Purpose: Process-local ConversationStore backed by an array.
 * Scope: Implements ConversationStore port. Does not persist across restarts.
 * Invariants: createdAt strictly increases across the store's lifetime (also across clear()); messages and their parts are frozen on append; snapshot() returns a copy.
 * Side-effects: none (in-memory state only)
 * Links: Implements ConversationStore port
 * @internal
 */

import type { ContentPart, Message, MessageDraft } from "@/core";
import type { ConversationStore } from "@/ports";

function freezeContent(
  content: MessageDraft["content"]
): Message["content"] {
  if (typeof content === "string") return content;
  return Object.freeze(content.map((part): ContentPart => Object.freeze({ ...part })));
}

export class InMemoryConversationStore implements ConversationStore {
  private messages: Message[] = [];
  private sequence = 0;

  append(draft: MessageDraft): Message {
    this.sequence += 1;
    const message: Message = Object.freeze({
      ...draft,
      content: freezeContent(draft.content),
      createdAt: this.sequence,
    });
    this.messages.push(message);
    return message;
  }

  snapshot(): readonly Message[] {
    return [...this.messages];
  }

  clear(): void {
    this.messages = [];
  }

  get size(): number {
    return this.messages.length;
  }
}
