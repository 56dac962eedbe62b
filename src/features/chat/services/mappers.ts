// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/services/mappers`
 * Purpose: DTO mapping for the chat feature - isolates core message types from external layers.
 * Scope: Flattens stored messages into display DTOs. Does not filter or reorder.
 * Invariants: Pure functions, no side effects.
 * Side-effects: none
 * Links: Used by app facades
 * @public
 */

import { type Message, type MessageRole, messageText } from "@/core";

export interface MessageDto {
  role: MessageRole;
  content: string;
  timestamp?: string | undefined;
}

export function toMessageDto(message: Message): MessageDto {
  return {
    role: message.role,
    content: messageText(message),
    ...(message.timestamp ? { timestamp: message.timestamp } : {}),
  };
}
