import { z } from 'zod';

export const PROVIDER_FAMILIES = [
  'local-process',
  'local-server',
  'cloud-openai-style',
  'cloud-anthropic-style'
] as const;

export type ProviderFamily = (typeof PROVIDER_FAMILIES)[number];

// Wire dialects a local inference server may speak
export const LOCAL_SERVER_DIALECTS = ['ndjson-chat', 'openai-compatible'] as const;

export type LocalServerDialect = (typeof LOCAL_SERVER_DIALECTS)[number];

export const BackendSelectionSchema = z.object({
  family: z.enum(PROVIDER_FAMILIES),
  modelId: z.string().trim().min(1, 'modelId is required'),
  endpoint: z.string().url().optional(),
  credential: z.string().min(1).optional(),
  dialect: z.enum(LOCAL_SERVER_DIALECTS).optional()
});

export type BackendSelection = z.infer<typeof BackendSelectionSchema>;

export const GatewaySettingsSchema = BackendSelectionSchema.extend({
  consentInstitutional: z.boolean().default(false),
  consentData: z.boolean().default(false)
});

export type GatewayConfig = z.infer<typeof GatewaySettingsSchema>;

export function isCloudFamily(family: ProviderFamily): boolean {
  return family === 'cloud-openai-style' || family === 'cloud-anthropic-style';
}
