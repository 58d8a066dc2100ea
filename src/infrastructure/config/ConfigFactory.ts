import * as dotenv from 'dotenv';
import { AppConfig, isLLMProvider, LLM_PROVIDERS, LLMProvider } from '../../domain/config/AppConfig';
import { ConfigurationError } from '../../domain/errors/AppErrors';
import { DEFAULT_ANTHROPIC_MODEL } from '../llm/AnthropicAdapter';
import { DEFAULT_GEMINI_MODEL } from '../llm/GeminiAdapter';
import { DEFAULT_OPENAI_MODEL } from '../llm/OpenAIAdapter';
import { AppConfigSchema } from './ConfigSchema';

export type Environment = Record<string, string | undefined>;

/**
 * Values from the command line, which win over the environment.
 */
export interface ConfigOverrides {
  provider?: string;
  maxSteps?: number;
  headless?: boolean;
  storageStatePath?: string;
  saveStatePath?: string;
}

const PROVIDER_ENV: Record<LLMProvider, { key: string; model: string; defaultModel: string }> = {
  anthropic: { key: 'ANTHROPIC_API_KEY', model: 'ANTHROPIC_MODEL', defaultModel: DEFAULT_ANTHROPIC_MODEL },
  openai: { key: 'OPENAI_API_KEY', model: 'OPENAI_MODEL', defaultModel: DEFAULT_OPENAI_MODEL },
  gemini: { key: 'GEMINI_API_KEY', model: 'GEMINI_MODEL', defaultModel: DEFAULT_GEMINI_MODEL },
};

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join('/')} (got "${value}")`);
}

export function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${name} must be an integer (got "${value}")`);
  }
  return parseInt(value, 10);
}

function lower(value: string | undefined): string | undefined {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : undefined;
}

export class ConfigFactory {
  /**
   * Builds the validated configuration from `.env`, the environment and
   * command line overrides.
   */
  static create(overrides: ConfigOverrides = {}, env: Environment = ConfigFactory.loadEnv()): AppConfig {
    const provider = lower(overrides.provider) ?? lower(env.LLM_PROVIDER) ?? 'anthropic';
    if (!isLLMProvider(provider)) {
      throw new ConfigurationError(`unsupported LLM provider "${provider}" (expected ${LLM_PROVIDERS.join(', ')})`);
    }
    const names = PROVIDER_ENV[provider];

    const rawConfig = {
      llm: {
        provider,
        apiKey: env[names.key] ?? '',
        model: env[names.model]?.trim() || names.defaultModel,
        timeoutMs: parseInteger('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS),
        payloadOverflow: lower(env.LLM_PAYLOAD_OVERFLOW),
      },
      browser: {
        headless: overrides.headless ?? parseBoolean('AGENT_HEADLESS', env.AGENT_HEADLESS),
        storageStatePath: overrides.storageStatePath,
        saveStatePath: overrides.saveStatePath,
      },
      agent: {
        maxSteps: overrides.maxSteps ?? parseInteger('AGENT_MAX_STEPS', env.AGENT_MAX_STEPS),
      },
      logLevel: lower(env.LOG_LEVEL),
    };

    const result = AppConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`invalid configuration: ${details}`);
    }
    return result.data;
  }

  private static loadEnv(): Environment {
    dotenv.config();
    return process.env;
  }
}
