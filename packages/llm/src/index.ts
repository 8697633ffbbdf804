// @chatwire/llm — streaming chat-completion client for OpenAI-compatible endpoints

export * from './types/index.js';
export * from './utils/error-mapping.js';
export * from './utils/http.js';
export * from './utils/sse.js';
export * from './utils/logger.js';
export * from './config/env.js';
export * from './providers/openai-compatible/index.js';
