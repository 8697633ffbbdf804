import { z } from 'zod';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      }),
    )
    .nullish(),
});

const modelsSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
    }),
  ),
});

/**
 * Reads the first choice's message text from a non-streaming completion.
 * Returns null when the body cannot be read that way.
 */
export function translateCompletionText(text: string): string | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }

  const result = completionSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  return result.data.choices?.[0]?.message?.content ?? null;
}

/**
 * Parses a `GET /models` body into its sorted model ids.
 * Throws when the body is not JSON or has no `data` list.
 */
export function translateModelList(text: string): Array<string> {
  const parsed = modelsSchema.parse(JSON.parse(text));
  return parsed.data.map((model) => model.id).sort();
}
