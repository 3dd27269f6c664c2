/**
 * @fileoverview Command-line argument parsing.
 *
 * @module sql-audit-agent/cli/args
 */

/**
 * Parsed command line.
 */
export interface CLIOptions {
  command: 'run' | 'ask' | 'tools' | 'help' | 'version';

  /** Question for `ask`, words joined by spaces */
  question: string;

  /** Force STEP_JSON output even on a terminal */
  structured: boolean;

  /** Overrides MAX_STEPS */
  maxSteps: number | undefined;

  verbose: boolean;

  /** Problems found while parsing; the CLI prints them and exits */
  errors: string[];
}

/**
 * Parses CLI arguments (without the node and script paths).
 */
export function parseArgs(args: ReadonlyArray<string>): CLIOptions {
  const options: CLIOptions = {
    command: 'run',
    question: '',
    structured: false,
    maxSteps: undefined,
    verbose: false,
    errors: [],
  };
  const words: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    switch (arg) {
      case 'ask':
        if (options.command === 'run') {
          options.command = 'ask';
        } else {
          words.push(arg);
        }
        break;

      case 'tools':
        if (options.command === 'run') {
          options.command = 'tools';
        } else {
          words.push(arg);
        }
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      case '-v':
      case '--version':
        options.command = 'version';
        break;

      case '--structured':
        options.structured = true;
        break;

      case '--max-steps': {
        const value = args[++i];
        const parsed = value === undefined ? NaN : Number(value);
        if (Number.isInteger(parsed) && parsed > 0) {
          options.maxSteps = parsed;
        } else {
          options.errors.push(`--max-steps expects a positive integer, got '${value ?? ''}'`);
        }
        break;
      }

      case '--verbose':
        options.verbose = true;
        break;

      default:
        if (arg.startsWith('--')) {
          options.errors.push(`Unknown option '${arg}'`);
        } else {
          words.push(arg);
        }
        break;
    }

    i++;
  }

  options.question = words.join(' ').trim();
  if (options.command === 'ask' && options.question.length === 0) {
    options.errors.push('ask needs a question');
  }
  if (options.command === 'run' && words.length > 0) {
    options.errors.push(`Unknown command '${words[0] ?? ''}'`);
  }

  return options;
}
