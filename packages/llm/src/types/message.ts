export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ToolCall = {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
};

export type SystemMessage = {
  readonly role: 'system';
  readonly content: string;
  readonly name?: string;
};

export type UserMessage = {
  readonly role: 'user';
  readonly content: string;
  readonly name?: string;
};

export type AssistantMessage = {
  readonly role: 'assistant';
  readonly content?: string;
  readonly toolCalls?: ReadonlyArray<ToolCall>;
  readonly name?: string;
};

export type ToolMessage = {
  readonly role: 'tool';
  readonly content: string;
  readonly toolCallId: string;
  readonly name?: string;
};

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export function systemMessage(text: string): SystemMessage {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(text: string): UserMessage {
  return {
    role: 'user',
    content: text,
  };
}

export function assistantMessage(
  content: string | undefined,
  toolCalls?: ReadonlyArray<ToolCall>,
): AssistantMessage {
  return {
    role: 'assistant',
    ...(content !== undefined && { content }),
    ...(toolCalls && toolCalls.length > 0 && { toolCalls }),
  };
}

export function toolMessage(toolCallId: string, content: string): ToolMessage {
  return {
    role: 'tool',
    content,
    toolCallId,
  };
}
