import { ConfigurationError } from '../../../src/domain/errors/AppErrors';
import { ConfigFactory, parseBoolean, parseInteger } from '../../../src/infrastructure/config/ConfigFactory';
import { DEFAULT_ANTHROPIC_MODEL } from '../../../src/infrastructure/llm/AnthropicAdapter';

describe('ConfigFactory', () => {
  it('should apply defaults around the provider key', () => {
    const config = ConfigFactory.create({}, { ANTHROPIC_API_KEY: 'test-secret' });

    expect(config).toEqual({
      llm: {
        provider: 'anthropic',
        apiKey: 'test-secret',
        model: DEFAULT_ANTHROPIC_MODEL,
        timeoutMs: 60000,
        payloadOverflow: 'truncate',
      },
      browser: { headless: false, timeout: 30000, width: 1280, height: 720 },
      agent: { maxSteps: 40 },
      logLevel: 'info',
    });
  });

  it('should read the provider, its key and a quoted model name', () => {
    const config = ConfigFactory.create(
      {},
      { LLM_PROVIDER: 'OpenAI', OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: ' "gpt-4o" ' }
    );

    expect(config.llm).toMatchObject({ provider: 'openai', apiKey: 'test-secret', model: 'gpt-4o' });
  });

  it('should let command line values win over the environment', () => {
    const config = ConfigFactory.create(
      { provider: 'gemini', maxSteps: 5, headless: false, saveStatePath: './state.json' },
      {
        LLM_PROVIDER: 'openai',
        GEMINI_API_KEY: 'test-secret',
        AGENT_MAX_STEPS: '12',
        AGENT_HEADLESS: 'yes',
      }
    );

    expect(config.llm.provider).toBe('gemini');
    expect(config.agent.maxSteps).toBe(5);
    expect(config.browser.headless).toBe(false);
    expect(config.browser.saveStatePath).toBe('./state.json');
  });

  it('should read agent and logging settings from the environment', () => {
    const config = ConfigFactory.create(
      {},
      {
        ANTHROPIC_API_KEY: 'test-secret',
        AGENT_HEADLESS: 'on',
        AGENT_MAX_STEPS: '12',
        LLM_TIMEOUT_MS: '15000',
        LLM_PAYLOAD_OVERFLOW: 'FAIL',
        LOG_LEVEL: 'Debug',
      }
    );

    expect(config.browser.headless).toBe(true);
    expect(config.agent.maxSteps).toBe(12);
    expect(config.llm.timeoutMs).toBe(15000);
    expect(config.llm.payloadOverflow).toBe('fail');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject unknown providers', () => {
    expect(() => ConfigFactory.create({ provider: 'mistral' }, {})).toThrow(
      'Configuration Error: unsupported LLM provider "mistral" (expected anthropic, openai, gemini)'
    );
  });

  it('should require the key of the selected provider', () => {
    expect(() => ConfigFactory.create({}, { LLM_PROVIDER: 'openai', ANTHROPIC_API_KEY: 'test-secret' })).toThrow(
      new ConfigurationError('invalid configuration: llm.apiKey: API key is required for the selected provider')
    );
  });

  it('should bound the step budget', () => {
    expect(() => ConfigFactory.create({}, { ANTHROPIC_API_KEY: 'test-secret', AGENT_MAX_STEPS: '5000' })).toThrow(
      'invalid configuration: agent.maxSteps: Number must be less than or equal to 1000'
    );
  });
});

describe('parseBoolean', () => {
  it.each([
    ['1', true],
    ['TRUE', true],
    [' yes ', true],
    ['off', false],
    ['No', false],
  ])('should parse %p', (value, expected) => {
    expect(parseBoolean('AGENT_HEADLESS', value)).toBe(expected);
  });

  it('should leave unset values undefined', () => {
    expect(parseBoolean('AGENT_HEADLESS', undefined)).toBeUndefined();
    expect(parseBoolean('AGENT_HEADLESS', '  ')).toBeUndefined();
  });

  it('should reject anything else', () => {
    expect(() => parseBoolean('AGENT_HEADLESS', 'maybe')).toThrow(
      'Configuration Error: AGENT_HEADLESS must be one of 1/true/yes/on/0/false/no/off (got "maybe")'
    );
  });
});

describe('parseInteger', () => {
  it('should parse whole numbers', () => {
    expect(parseInteger('AGENT_MAX_STEPS', ' 25 ')).toBe(25);
  });

  it('should reject fractions and words', () => {
    expect(() => parseInteger('AGENT_MAX_STEPS', '2.5')).toThrow('AGENT_MAX_STEPS must be an integer (got "2.5")');
    expect(() => parseInteger('AGENT_MAX_STEPS', 'ten')).toThrow(ConfigurationError);
  });
});
