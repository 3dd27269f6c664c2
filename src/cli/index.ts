#!/usr/bin/env node
/**
 * @fileoverview SQL Audit Agent CLI
 *
 * Usage:
 *   audit-agent                     interactive session (structured run when stdin is piped)
 *   audit-agent ask <question>      answer one question and exit
 *   audit-agent tools               list the tools offered to the model
 *   audit-agent --help
 */

import 'dotenv/config';
import * as readline from 'readline';
import { loadConfig } from '../config/index.js';
import { describeError } from '../errors.js';
import { parseArgs, type CLIOptions } from './args.js';
import { createAgent, describeTools, formatBanner, readQuestion, runInteractive } from './session.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
USAGE:
  audit-agent [command] [options]

COMMANDS:
  (none)              Interactive session on a terminal; with piped stdin,
                      answer the first line and print STEP_JSON events
  ask <question>      Answer one question and exit
  tools               List available tools

OPTIONS:
  --structured        Print STEP_JSON events instead of the final analysis
  --max-steps <n>     Step budget for each question (default: MAX_STEPS or 20)
  --verbose           Debug logging on stderr
  -h, --help          Show this help message
  -v, --version       Show version

ENVIRONMENT:
  GROQ_API_KEY (required), MODEL_BASE_URL, MODEL_NAME,
  PG_HOST, PG_PORT, PG_DATABASE, PG_USER, PG_PASSWORD,
  SMTP_SERVER, SMTP_PORT, SMTP_USER, SMTP_PASSWORD, ALERT_RECIPIENT,
  AUDIT_OUTPUT_DIR, MAX_STEPS, MAX_ACTIONS_PER_STEP, LOG_LEVEL
  Values are also read from a .env file in the working directory.
`);
}

function listTools(options: CLIOptions): void {
  const config = loadConfig(process.env, process.cwd(), { requireApiKey: false });
  process.stdout.write(describeTools(config, { verbose: options.verbose }));
}

async function askOnce(question: string, options: CLIOptions, structured: boolean): Promise<void> {
  const { loop } = createAgent(loadConfig(), {
    structured,
    maxSteps: options.maxSteps,
    verbose: options.verbose,
  });
  await loop.run(question);
}

async function runPiped(options: CLIOptions): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  const question = await readQuestion(rl);
  rl.close();

  if (question !== null) {
    await askOnce(question, options, true);
  }
}

async function runTerminal(options: CLIOptions): Promise<void> {
  const { loop } = createAgent(loadConfig(), {
    structured: options.structured,
    maxSteps: options.maxSteps,
    verbose: options.verbose,
  });

  process.stdout.write(formatBanner());

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('You: ');
  rl.on('SIGINT', () => {
    process.stdout.write('\n\nInterrupted.\n');
    rl.close();
  });

  try {
    await runInteractive(rl, loop, {
      write: (text) => process.stdout.write(text),
      prompt: () => rl.prompt(),
    });
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.errors.length > 0) {
    for (const error of options.errors) {
      console.error(`Error: ${error}`);
    }
    console.error('Run audit-agent --help for usage.');
    process.exitCode = 2;
    return;
  }

  switch (options.command) {
    case 'help':
      printHelp();
      break;

    case 'version':
      console.log(`audit-agent v${VERSION}`);
      break;

    case 'tools':
      listTools(options);
      break;

    case 'ask':
      await askOnce(options.question, options, options.structured);
      break;

    case 'run':
      if (process.stdin.isTTY) {
        await runTerminal(options);
      } else {
        await runPiped(options);
      }
      break;
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
