// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/system-prompt.server`
 * Purpose: Defines the baseline system prompt that seeds every conversation.
 * Scope: Prompt text and the seeding rule. Does not modify user messages.
 * Invariants: The seeded prompt is the first message of a non-empty history; it carries no marker.
 * Side-effects: none
 * Links: Used by the chat orchestrator; overridable via CHAT_SYSTEM_PROMPT
 * @internal
 */

import type { MessageDraft } from "@/core/chat/model";

/**
 * Baseline system prompt for the leave-the-house assistant.
 * Tool names are not hardcoded beyond what the weather and air-quality servers advertise.
 */
export const BASELINE_SYSTEM_PROMPT =
  "You are in charge of helping the user get ready to leave the house. " +
  "Use the get-weather tool to check the current weather for the current city. " +
  "Check the air quality index to see if its suitable to go outside today. " +
  "Then make recommendations on what the user should do before going outside. " +
  "Remove the emojis. Display the result in plain text instead of Markdown.";

export function systemPromptDraft(
  prompt: string = BASELINE_SYSTEM_PROMPT
): MessageDraft {
  return { role: "system", content: prompt };
}
