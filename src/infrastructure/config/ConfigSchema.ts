import { z } from 'zod';
import { AppConfig, LLM_PROVIDERS } from '../../domain/config/AppConfig';

export const LLMSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('anthropic'),
  apiKey: z.string().trim().min(1, 'API key is required for the selected provider'),
  model: z
    .string()
    .trim()
    .transform(model => model.replace(/^["']|["']$/g, ''))
    .pipe(z.string().min(1, 'model name is empty')),
  timeoutMs: z.number().int().positive().default(60000),
  payloadOverflow: z.enum(['truncate', 'fail']).default('truncate'),
});

export const BrowserSchema = z.object({
  headless: z.boolean().default(false),
  timeout: z.number().int().positive().default(30000),
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(720),
  storageStatePath: z.string().min(1).optional(),
  saveStatePath: z.string().min(1).optional(),
});

export const AgentSchema = z.object({
  maxSteps: z.number().int().positive().max(1000).default(40),
});

export const AppConfigSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
  llm: LLMSchema,
  browser: BrowserSchema.default({}),
  agent: AgentSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});
