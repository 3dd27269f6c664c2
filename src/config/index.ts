/**
 * @fileoverview Runtime configuration read from the environment.
 *
 * Callers load `.env` (the CLI imports `dotenv/config`) and hand the
 * resulting environment to {@link loadConfig}. Blank values count as unset.
 *
 * @module sql-audit-agent/config
 * @version 0.1.0
 */

import * as path from 'path';
import { z } from 'zod';
import type { Severity } from '../types/core.types.js';
import { parseSeverity } from '../observability/logger.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_BASE_URL, DEFAULT_MODEL } from '../providers/base.js';
import type { PgConnectionConfig } from '../tools/sql-client.js';
import type { SmtpSettings } from '../tools/mailer.js';

export interface AuditConfig {
  readonly model: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly model: string;
  };
  readonly database: PgConnectionConfig;
  readonly smtp: SmtpSettings;

  /** Where email alerts go; the prompt pins it when set */
  readonly alertRecipient: string | undefined;

  /** Root for alerts/, reports/, review_requests/ and email_logs/ */
  readonly outputDir: string;

  readonly maxSteps: number;
  readonly maxActionsPerStep: number;
  readonly logLevel: Severity;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const count = (fallback: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(max).default(fallback));

const EnvSchema = z.object({
  GROQ_API_KEY: z.preprocess(blankToUndefined, z.string()),
  MODEL_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  MODEL_NAME: text(DEFAULT_MODEL),

  PG_HOST: text('localhost'),
  PG_PORT: count(5432, 65535),
  PG_DATABASE: text('audit'),
  PG_USER: text('postgres'),
  PG_PASSWORD: text(''),

  SMTP_SERVER: text('localhost'),
  SMTP_PORT: count(1025, 65535),
  SMTP_USER: text('agent@audit.local'),
  SMTP_PASSWORD: text(''),
  ALERT_RECIPIENT: z.preprocess(blankToUndefined, z.string().email().optional()),

  AUDIT_OUTPUT_DIR: text('.'),
  MAX_STEPS: count(20, 1000),
  MAX_ACTIONS_PER_STEP: count(5, 100),
  LOG_LEVEL: text('INFO').transform((value, ctx) => {
    const level = parseSeverity(value);
    if (level === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown log level '${value}'`,
      });
      return z.NEVER;
    }
    return level;
  }),
});

// For commands that never reach the model
const KeylessEnvSchema = EnvSchema.extend({
  GROQ_API_KEY: z.preprocess(blankToUndefined, z.string().default('')),
});

export interface LoadConfigOptions {
  /** Defaults to true; `false` leaves `model.apiKey` empty when unset */
  readonly requireApiKey?: boolean;
}

/**
 * Validates the environment and builds the configuration.
 *
 * @param env - Variables to read, usually `process.env`
 * @param cwd - Base for a relative output directory
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  cwd: string = process.cwd(),
  options: LoadConfigOptions = {},
): AuditConfig {
  const schema = options.requireApiKey === false ? KeylessEnvSchema : EnvSchema;
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    model: {
      apiKey: vars.GROQ_API_KEY,
      baseUrl: vars.MODEL_BASE_URL,
      model: vars.MODEL_NAME,
    },
    database: {
      host: vars.PG_HOST,
      port: vars.PG_PORT,
      database: vars.PG_DATABASE,
      user: vars.PG_USER,
      password: vars.PG_PASSWORD,
    },
    smtp: {
      host: vars.SMTP_SERVER,
      port: vars.SMTP_PORT,
      user: vars.SMTP_USER,
      password: vars.SMTP_PASSWORD,
    },
    alertRecipient: vars.ALERT_RECIPIENT,
    outputDir: path.resolve(cwd, vars.AUDIT_OUTPUT_DIR),
    maxSteps: vars.MAX_STEPS,
    maxActionsPerStep: vars.MAX_ACTIONS_PER_STEP,
    logLevel: vars.LOG_LEVEL,
  };
}
