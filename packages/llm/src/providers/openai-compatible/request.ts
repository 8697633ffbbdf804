import type {
  ChatMessage,
  ProviderConfig,
  TimeoutConfig,
  ToolChoice,
  ToolDefinition,
} from '../../types/index.js';
import { normalizeBaseUrl, systemMessage, userMessage } from '../../types/index.js';

export type ChatRequest = {
  readonly config: ProviderConfig;
  readonly messages: ReadonlyArray<ChatMessage>;
  readonly tools?: ReadonlyArray<ToolDefinition>;
  readonly toolChoice?: ToolChoice;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

export const CONNECTION_TEST_PROMPT = "Say 'Connection successful!' in exactly those words.";

function authHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };
}

export function translateMessage(message: ChatMessage): Record<string, unknown> {
  const wire: Record<string, unknown> = { role: message.role };

  switch (message.role) {
    case 'system':
    case 'user':
      wire['content'] = message.content;
      break;

    case 'assistant':
      if (message.content !== undefined) {
        wire['content'] = message.content;
      }
      if (message.toolCalls && message.toolCalls.length > 0) {
        wire['tool_calls'] = message.toolCalls.map((toolCall) => ({
          id: toolCall.id,
          type: 'function',
          function: {
            name: toolCall.name,
            arguments: toolCall.arguments,
          },
        }));
      }
      break;

    case 'tool':
      wire['content'] = message.content;
      wire['tool_call_id'] = message.toolCallId;
      break;
  }

  if (message.name !== undefined) {
    wire['name'] = message.name;
  }

  return wire;
}

export function translateRequest(
  request: Readonly<ChatRequest>,
  streaming: boolean = false,
): RequestOutput {
  const { config } = request;
  const url = `${normalizeBaseUrl(config.baseUrl)}/chat/completions`;
  const headers = authHeaders(config.apiKey);
  if (streaming) {
    headers['Accept'] = 'text/event-stream';
  }

  const messages: Array<Record<string, unknown>> = [];

  if (config.systemPrompt && config.systemPrompt.trim() !== '') {
    messages.push(translateMessage(systemMessage(config.systemPrompt)));
  }

  for (const message of request.messages) {
    messages.push(translateMessage(message));
  }

  const body: Record<string, unknown> = {
    model: config.model,
    messages,
    stream: streaming,
  };

  if (config.temperature !== undefined) {
    body['temperature'] = config.temperature;
  }
  if (config.maxTokens !== undefined) {
    body['max_tokens'] = config.maxTokens;
  }

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
    body['tool_choice'] = request.toolChoice ?? 'auto';
  }

  return { url, headers, body };
}

/** A tiny non-streaming completion used only to prove reachability and auth. */
export function translateConnectionTest(config: Readonly<ProviderConfig>): RequestOutput {
  return {
    url: `${normalizeBaseUrl(config.baseUrl)}/chat/completions`,
    headers: authHeaders(config.apiKey),
    body: {
      model: config.model,
      messages: [translateMessage(userMessage(CONNECTION_TEST_PROMPT))],
      stream: false,
      temperature: 0.1,
      max_tokens: 20,
    },
  };
}

export function translateModelsRequest(
  config: Readonly<ProviderConfig>,
): Omit<RequestOutput, 'body'> {
  return {
    url: `${normalizeBaseUrl(config.baseUrl)}/models`,
    headers: authHeaders(config.apiKey),
  };
}
