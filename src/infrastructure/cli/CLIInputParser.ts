/**
 * Interface for parsed CLI options.
 */
export interface CLIOptions {
  task?: string;
  storageStatePath?: string;
  saveStatePath?: string;
  maxSteps?: number;
  headless?: boolean;
  provider?: string;
  help?: boolean;
  /** Unknown flags and flags missing their value */
  errors: string[];
}

const VALUE_FLAGS = ['--task', '--storage', '--save-state', '--max-steps', '--provider'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some(flag => flag === arg);
}

/**
 * Handles parsing and validation of command line arguments.
 * Both `--flag value` and `--flag=value` forms are accepted.
 */
export class CLIInputParser {
  /**
   * Parse command line arguments.
   * @param args - Arguments array (usually process.argv.slice(2))
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = { errors: [] };
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--help' || arg === '-h') {
        options.help = true;
        return options;
      }
      if (arg === '--headless') {
        options.headless = true;
        continue;
      }

      const eq = arg.indexOf('=');
      const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
      if (isValueFlag(flag)) {
        let value: string | undefined;
        if (flag !== arg) {
          value = arg.slice(eq + 1);
        } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
          value = args[++i];
        }
        if (value === undefined || value === '') {
          options.errors.push(`${flag} requires a value`);
          continue;
        }
        CLIInputParser.apply(options, flag, value);
      } else if (arg.startsWith('-')) {
        options.errors.push(`unknown option ${arg}`);
      } else {
        positional.push(arg);
      }
    }

    // Bare words form the task when --task is absent
    if (options.task === undefined && positional.length > 0) {
      options.task = positional.join(' ');
    }
    return options;
  }

  private static apply(options: CLIOptions, flag: ValueFlag, value: string): void {
    switch (flag) {
      case '--task':
        options.task = value;
        break;
      case '--storage':
        options.storageStatePath = value;
        break;
      case '--save-state':
        options.saveStatePath = value;
        break;
      case '--provider':
        options.provider = value;
        break;
      case '--max-steps': {
        const steps = Number(value);
        if (Number.isInteger(steps) && steps > 0) {
          options.maxSteps = steps;
        } else {
          options.errors.push(`--max-steps must be a positive integer (got "${value}")`);
        }
        break;
      }
    }
  }

  /**
   * Generate help text for the CLI.
   */
  static getHelpText(): string {
    return `
Browser Task Agent

Usage:
  npm start -- [options] [task words...]

Options:
  --task <text>          Task for the agent (asked on stdin when omitted)
  --storage <path>       Load browser storage state (cookies, local storage) from a file
  --save-state <path>    Save browser storage state to a file on exit
  --max-steps <n>        Step budget (default: AGENT_MAX_STEPS or 40)
  --headless             Run the browser without a window
  --provider <name>      LLM provider: anthropic, openai or gemini
  --help, -h             Show this help message

Environment:
  LLM_PROVIDER, ANTHROPIC_API_KEY, OPENAI_API_KEY, GEMINI_API_KEY,
  ANTHROPIC_MODEL, OPENAI_MODEL, GEMINI_MODEL, AGENT_HEADLESS,
  AGENT_MAX_STEPS, LLM_PAYLOAD_OVERFLOW, LLM_TIMEOUT_MS, LOG_LEVEL

Examples:
  npm start -- --task "Find the cheapest flight to Berlin next Friday"
  npm start -- --storage ./state.json --save-state ./state.json --headless
`;
  }
}
