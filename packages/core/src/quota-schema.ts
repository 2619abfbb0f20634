import { z } from 'zod';

/**
 * Schema-tolerant view of the GetUserStatus response. Every field falls back
 * to undefined when missing or of the wrong type, so one malformed entry
 * never fails the whole parse.
 */
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const text = lenient(z.string());
const fraction = lenient(z.number().finite());

// int64 fields may arrive as JSON strings
const integer = lenient(
  z.union([
    z.number(),
    z.string().regex(/^\s*[+-]?\d+\s*$/).transform((value) => Number.parseInt(value, 10)),
  ]).transform((value) => Math.trunc(value)),
);

export const quotaInfoSchema = z.object({
  remainingFraction: fraction,
  resetTime: text,
});

export const modelConfigSchema = z.object({
  label: text,
  modelOrAlias: lenient(z.object({ model: text })),
  quotaInfo: lenient(quotaInfoSchema),
});

const planInfoSchema = z.object({
  planName: text,
  teamsTier: text,
  monthlyPromptCredits: integer,
  monthlyFlowCredits: integer,
});

const planStatusSchema = z.object({
  planInfo: lenient(planInfoSchema),
  availablePromptCredits: integer,
  availableFlowCredits: integer,
});

const userStatusSchema = z.object({
  name: text,
  email: text,
  planStatus: lenient(planStatusSchema),
  cascadeModelConfigData: lenient(z.object({
    // Entries are parsed one by one with modelConfigSchema
    clientModelConfigs: lenient(z.array(z.unknown())),
  })),
});

export const userStatusResponseSchema = z.object({
  userStatus: lenient(userStatusSchema),
});

export type RawModelConfig = z.infer<typeof modelConfigSchema>;
export type RawQuotaInfo = z.infer<typeof quotaInfoSchema>;
export type RawUserStatusResponse = z.infer<typeof userStatusResponseSchema>;
