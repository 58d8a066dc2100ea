/**
 * Leveled, categorized logging for the agent.
 *
 * Every logger reads the global configuration on each call, so the
 * module-level `loggers` created at import time follow `setGlobalLoggerConfig`
 * applied later at startup.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  minLevel: LogLevel;
  /** Prefix lines with HH:MM:SS (default: false) */
  includeTimestamp: boolean;
  /** ANSI colors in text output (default: true) */
  useColors: boolean;
  /** One JSON object per line instead of text (default: false) */
  jsonOutput: boolean;
  /** Receives entries instead of the console */
  customHandler?: (entry: LogEntry) => void;
}

interface LevelStyle {
  priority: number;
  color: string;
  write: (line: string) => void;
}

/* eslint-disable no-console */
const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { priority: 0, color: '\x1b[90m', write: line => console.log(line) },
  info: { priority: 1, color: '\x1b[36m', write: line => console.log(line) },
  warn: { priority: 2, color: '\x1b[33m', write: line => console.warn(line) },
  error: { priority: 3, color: '\x1b[31m', write: line => console.error(line) },
};
/* eslint-enable no-console */

const CATEGORY_COLORS: Record<string, string> = {
  Agent: '\x1b[35m',
  Browser: '\x1b[34m',
  Snapshot: '\x1b[36m',
  LLM: '\x1b[34m',
  Recovery: '\x1b[33m',
  LoopGuard: '\x1b[31m',
  Security: '\x1b[31m',
  Config: '\x1b[32m',
  CLI: '\x1b[32m',
  Event: '\x1b[90m',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const DEFAULT_CATEGORY_COLOR = '\x1b[37m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

let globalConfig: Partial<LoggerConfig> = {};

/**
 * Replaces the global configuration. Fields left out fall back to defaults.
 */
export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = config;
}

function paint(text: string, color: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

function formatContext(context: LogContext): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

/**
 * Renders an entry as one text line: `[time] [Category] message (k=v ...)`.
 */
function formatEntry(entry: LogEntry, config: LoggerConfig): string {
  const { useColors } = config;
  const parts: string[] = [];
  if (config.includeTimestamp) {
    parts.push(paint(entry.timestamp.slice(11, 19), DIM, useColors));
  }
  parts.push(paint(`[${entry.category}]`, CATEGORY_COLORS[entry.category] ?? DEFAULT_CATEGORY_COLOR, useColors));
  parts.push(entry.message);
  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(paint(`(${formatContext(entry.context)})`, DIM, useColors));
  }
  return parts.join(' ');
}

export class Logger {
  private readonly overrides: Partial<LoggerConfig>;

  constructor(
    private readonly category: string,
    overrides: Partial<LoggerConfig> = {}
  ) {
    this.overrides = { ...overrides };
  }

  private get config(): LoggerConfig {
    return { ...DEFAULT_CONFIG, ...globalConfig, ...this.overrides };
  }

  /**
   * Overrides the minimum level for this logger only.
   */
  setLevel(level: LogLevel): void {
    this.overrides.minLevel = level;
  }

  private enabled(level: LogLevel, config: LoggerConfig): boolean {
    return LEVELS[level].priority >= LEVELS[config.minLevel].priority;
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    const config = this.config;
    if (!this.enabled(level, config)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, category: this.category, message, context };

    if (config.customHandler) {
      config.customHandler(entry);
    } else if (config.jsonOutput) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(entry));
    } else {
      const line = formatEntry(entry, config);
      LEVELS[level].write(config.useColors ? paint(line, LEVELS[level].color, level === 'warn' || level === 'error') : line);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  /**
   * Prints the one-line outcome of an agent step, without the category prefix.
   */
  step(stepNumber: number, action: string, outcome: string, recovered = false): void {
    const config = this.config;
    if (!this.enabled('info', config)) {
      return;
    }
    const line = `agent[${stepNumber}]: ${action}${recovered ? ' (recovered)' : ''} -> ${outcome}`;
    if (config.customHandler) {
      config.customHandler({ timestamp: new Date().toISOString(), level: 'info', category: this.category, message: line });
      return;
    }
    // eslint-disable-next-line no-console
    console.log(line);
  }

  child(subCategory: string): Logger {
    return new Logger(`${this.category}:${subCategory}`, this.overrides);
  }
}

export function getLogger(category: string): Logger {
  return new Logger(category);
}

/**
 * Loggers for the agent's categories.
 */
export const loggers = {
  agent: getLogger('Agent'),
  browser: getLogger('Browser'),
  snapshot: getLogger('Snapshot'),
  llm: getLogger('LLM'),
  recovery: getLogger('Recovery'),
  loopGuard: getLogger('LoopGuard'),
  security: getLogger('Security'),
  config: getLogger('Config'),
  cli: getLogger('CLI'),
  event: getLogger('Event'),
};
