import { z } from 'zod';
import type { ArbiterThresholds } from './router.types.js';
import { ConfigurationError } from './router.errors.js';

const unitInterval = z.coerce.number().min(0).max(1);
const timeoutMs = z.coerce.number().int().positive();

export const thresholdsSchema = z
  .object({
    directScore: unitInterval.default(0.65),
    directMargin: unitInterval.default(0.15),
    lowConfScore: unitInterval.default(0.5),
    lowConfMargin: unitInterval.default(0.08),
    clarifyMargin: unitInterval.default(0.03),
    arbitrationMediumConfidence: unitInterval.default(0.7),
  })
  .superRefine((t, ctx) => {
    if (t.clarifyMargin >= t.lowConfMargin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['clarifyMargin'],
        message: 'clarifyMargin must be below lowConfMargin',
      });
    }
    if (t.lowConfMargin > t.directMargin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lowConfMargin'],
        message: 'lowConfMargin must not exceed directMargin',
      });
    }
    if (t.lowConfScore > t.directScore) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lowConfScore'],
        message: 'lowConfScore must not exceed directScore',
      });
    }
  });

export const routerSettingsSchema = z.object({
  thresholds: thresholdsSchema.default({}),
  topK: z.coerce.number().int().min(1).max(50).default(5),
  /** Agents offered in a clarification question */
  clarifyCandidateLimit: z.coerce.number().int().min(2).max(4).default(3),
  /** Agent used when nothing else can be decided */
  defaultAgentId: z.string().min(1).default('google_site'),
  timeouts: z.object({
    embeddingMs: timeoutMs.default(5000),
    vectorSearchMs: timeoutMs.default(3000),
    llmMs: timeoutMs.default(8000),
  }).default({}),
});

export type RouterSettings = z.infer<typeof routerSettingsSchema>;
export type RouterSettingsInput = z.input<typeof routerSettingsSchema>;

export const DEFAULT_THRESHOLDS: ArbiterThresholds = thresholdsSchema.parse({});

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate router settings, filling defaults.
 * Throws ConfigurationError on invalid thresholds.
 */
export function resolveRouterSettings(input: RouterSettingsInput = {}): RouterSettings {
  const parsed = routerSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid router settings: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
