import { LLMPort } from '../../application/ports/LLMPort';
import { EmailAgent } from '../../application/services/subagents';
import { TaskRunner } from '../../application/services/TaskRunner';
import { AppConfig } from '../../domain/config/AppConfig';
import { PageStateExtractor } from '../browser/PageStateExtractor';
import { PlaywrightDriver } from '../browser/PlaywrightDriver';
import { CLIInteractionAdapter } from '../cli/CLIInteractionAdapter';
import { AgentEventHandlers } from '../events/AgentEventHandlers';
import { InMemoryEventBus } from '../events/InMemoryEventBus';
import { LLMAdapterFactory } from '../llm/LLMAdapterFactory';
import { getPromptConfig, setPromptConfig } from '../llm/prompts';
import { loggers, setGlobalLoggerConfig } from '../logging';

export interface ApplicationContainer {
  config: AppConfig;
  driver: PlaywrightDriver;
  llm: LLMPort;
  extractor: PageStateExtractor;
  eventBus: InMemoryEventBus;
  eventHandlers: AgentEventHandlers;
  cli: CLIInteractionAdapter;
  taskRunner: TaskRunner;
}

export class CompositionRoot {
  /**
   * Wires the adapters around a validated configuration and launches the
   * browser. The caller owns `driver.close()` and `cli.close()`.
   */
  static async initialize(config: AppConfig): Promise<ApplicationContainer> {
    setGlobalLoggerConfig({ minLevel: config.logLevel });
    setPromptConfig({ payload: { ...getPromptConfig().payload, overflow: config.llm.payloadOverflow } });

    const llm = LLMAdapterFactory.create({
      provider: config.llm.provider,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });

    const driver = new PlaywrightDriver({
      headless: config.browser.headless,
      timeout: config.browser.timeout,
      storageStatePath: config.browser.storageStatePath,
      viewportWidth: config.browser.width,
      viewportHeight: config.browser.height,
    });
    await driver.initialize();

    const extractor = new PageStateExtractor(() => driver.getPage());
    const eventBus = new InMemoryEventBus();
    const eventHandlers = new AgentEventHandlers(eventBus, config.logLevel === 'debug');
    eventHandlers.register();
    const cli = new CLIInteractionAdapter();

    const taskRunner = new TaskRunner({
      driver,
      llm,
      capture: extractor.provider(),
      user: cli,
      eventBus,
      subAgents: [new EmailAgent()],
    });

    loggers.agent.debug('Application wired', {
      provider: config.llm.provider,
      model: llm.model,
      headless: config.browser.headless,
    });

    return { config, driver, llm, extractor, eventBus, eventHandlers, cli, taskRunner };
  }
}
