import { z } from 'zod';

/*
 * Wire shapes of the local translation service. The daemon validates request
 * bodies with these schemas and the client validates responses, so both ends
 * stay in step.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const DirectionStatusSchema = z.object({
  installed: z.boolean(),
  reason: z.string(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const ModelsStatusSchema = z.object({
  model_dir: z.string(),
  en_ja: DirectionStatusSchema,
  ja_en: DirectionStatusSchema,
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const ModelsVerifySchema = ModelsStatusSchema.extend({
  ok: z.boolean(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const ModelsRemoveSchema = z.object({
  ok: z.boolean(),
  model_dir: z.string(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const HealthSchema = z.object({
  status: z.string(),
  backend: z.string(),
  pairs: z.array(z.tuple([z.string(), z.string()])),
  models: ModelsStatusSchema,
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const TranslateRequestSchema = z.object({
  text: z.string(),
  source_lang: z.string(),
  target_lang: z.string(),
  request_id: z.string().optional(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const TranslateResponseSchema = z.object({
  translated_text: z.string(),
  source_lang: z.string(),
  target_lang: z.string(),
  backend: z.string(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const BacktranslateRequestSchema = z.object({
  text: z.string(),
  source_lang: z.string().default('en'),
  intermediate_lang: z.string().default('ja'),
  target_lang: z.string().default('en'),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const BacktranslateResponseSchema = z.object({
  original_text: z.string(),
  intermediate_text: z.string(),
  final_text: z.string(),
  source_lang: z.string(),
  intermediate_lang: z.string(),
  target_lang: z.string(),
  backend: z.string(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const ModelInstallRequestSchema = z.object({
  en_ja_url: z.string().default(''),
  ja_en_url: z.string().default(''),
  en_ja_sha256: z.string().nullish(),
  ja_en_sha256: z.string().nullish(),
  preset: z.string().nullish(),
});

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    retryable: z.boolean().optional(),
  }),
});

export type DirectionStatus = z.infer<typeof DirectionStatusSchema>;
export type ModelsStatus = z.infer<typeof ModelsStatusSchema>;
export type ModelsVerifyResult = z.infer<typeof ModelsVerifySchema>;
export type ModelsRemoveResult = z.infer<typeof ModelsRemoveSchema>;
export type HealthResponse = z.infer<typeof HealthSchema>;
export type TranslateWireResponse = z.infer<typeof TranslateResponseSchema>;
export type BacktranslateWireResponse = z.infer<typeof BacktranslateResponseSchema>;
export type ModelInstallRequest = z.input<typeof ModelInstallRequestSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
