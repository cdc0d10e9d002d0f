import type { ChatTurn, GenerationRequest } from '../types/index.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export function buildChatMessages(request: GenerationRequest): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  for (const turn of request.history ?? []) {
    messages.push({ role: turn.role, content: turn.content });
  }
  messages.push({ role: 'user', content: request.text });
  return messages;
}

/**
 * Conversation turns for APIs that take the system prompt separately and
 * insist the first turn comes from the user.
 */
export function buildConversationTurns(request: GenerationRequest): ChatTurn[] {
  const turns: ChatTurn[] = [...(request.history ?? []), { role: 'user', content: request.text }];
  const firstUser = turns.findIndex((turn) => turn.role === 'user');
  return turns.slice(firstUser);
}

const ROLE_PREFIX: Record<ChatMessage['role'], string> = {
  system: 'System',
  user: 'User',
  assistant: 'Assistant'
};

// For engines without a multi-turn API: one prompt, ending where the model should continue
export function flattenConversation(request: GenerationRequest): string {
  const blocks = buildChatMessages(request).map(
    (message) => `${ROLE_PREFIX[message.role]}: ${message.content}`
  );
  blocks.push(`${ROLE_PREFIX.assistant}:`);
  return blocks.join('\n\n');
}
