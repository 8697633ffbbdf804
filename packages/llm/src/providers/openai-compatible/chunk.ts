import { z } from 'zod';

const toolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative().nullish(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

const chunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z.array(toolCallDeltaSchema).nullish(),
          })
          .nullish(),
        finish_reason: z.string().nullish(),
      }),
    )
    .nullish(),
});

export type ToolCallDeltaChunk = z.infer<typeof toolCallDeltaSchema>;
export type ChatCompletionChunk = z.infer<typeof chunkSchema>;

export type ParsedPayload =
  | { readonly kind: 'DONE' }
  | { readonly kind: 'CHUNK'; readonly chunk: ChatCompletionChunk }
  | { readonly kind: 'SKIP' };

export const DONE_SENTINEL = '[DONE]';

/**
 * Classifies one `data:` payload. Payloads that are not JSON, or not shaped
 * like a completion chunk, are skipped so a single bad frame never ends the stream.
 */
export function parsePayload(data: string): ParsedPayload {
  const payload = data.trim();
  if (payload === DONE_SENTINEL) {
    return { kind: 'DONE' };
  }
  if (!payload) {
    return { kind: 'SKIP' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return { kind: 'SKIP' };
  }

  const result = chunkSchema.safeParse(raw);
  if (!result.success) {
    return { kind: 'SKIP' };
  }
  return { kind: 'CHUNK', chunk: result.data };
}
