/**
 * Strict parsers for the two JSON shapes the arbitration prompts ask for.
 *
 * Models often wrap JSON in markdown fences or add a sentence around it.
 * The parser strips known wrapping, then validates against a schema; any
 * failure is reported as LlmResponseFormatError for the caller to fall back on.
 */

import { z } from 'zod';
import { LlmResponseFormatError } from './router.errors.js';

export const clarificationResponseSchema = z.object({
  question: z.string().trim().min(1),
  options: z
    .array(
      z.object({
        label: z.string().trim().min(1),
        value: z.string().trim().min(1),
      })
    )
    .min(1),
});

export const arbitrationResponseSchema = z.object({
  chosen_agent: z.string().trim().min(1),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().trim().default(''),
});

export type ClarificationResponse = z.infer<typeof clarificationResponseSchema>;
export type ArbitrationResponse = z.infer<typeof arbitrationResponseSchema>;

const FENCED_BLOCK = /```(?:json|JSON)?\s*([\s\S]*?)```/;

/**
 * Remove markdown fences and any prose around the outermost JSON object
 */
export function stripJsonWrapping(content: string): string {
  let text = content.trim();

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    text = text.slice(start, end + 1);
  }

  return text;
}

function parseWith<T extends z.ZodTypeAny>(schema: T, content: string, shape: string): z.infer<T> {
  const text = stripJsonWrapping(content);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new LlmResponseFormatError(`${shape} response is not valid JSON`, content);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
    throw new LlmResponseFormatError(`${shape} response has invalid fields: ${fields}`, content);
  }
  return parsed.data;
}

export function parseClarificationResponse(content: string): ClarificationResponse {
  return parseWith(clarificationResponseSchema, content, 'Clarification');
}

export function parseArbitrationResponse(content: string): ArbitrationResponse {
  return parseWith(arbitrationResponseSchema, content, 'Arbitration');
}
