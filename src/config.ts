import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { BotConfig } from './types/index.js';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  CONFIG_PATH: z.string().min(1).default('config.yaml'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NO_COLOR: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

// YAML leaves a bare `filters:` as null; treat it like an omitted section
function section<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => value ?? {}, schema);
}

export function isRegexPattern(label: string): boolean {
  return label.length > 2 && label.startsWith('/') && label.endsWith('/');
}

const answerSchema = z
  .object({
    label: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  })
  .refine(
    (answer) => {
      if (!isRegexPattern(answer.label)) return true;
      try {
        new RegExp(answer.label.slice(1, -1), 'i');
        return true;
      } catch {
        return false;
      }
    },
    { message: 'label is not a valid regular expression', path: ['label'] }
  );

const configSchema = z.object({
  browser: section(
    z.object({
      cdp_url: z.string().url().default('http://localhost:9222'),
      jobs_url_pattern: z.string().min(1).default('linkedin.com/jobs'),
      default_timeout_ms: z.number().int().positive().default(5000),
    })
  ),
  filters: section(
    z.object({
      location: z.string().optional(),
      distance: z.string().nullable().optional(),
      time_posted: z.string().optional(),
      easy_apply: z.boolean().optional(),
    })
  ),
  behavior: section(
    z.object({
      pause_on_unfilled: z.boolean().default(true),
      max_idle_seconds: z.number().nonnegative().default(900),
      fill_known_fields: z.boolean().default(true),
      max_jobs: z.number().int().nonnegative().default(0),
      exclude_keywords: z.array(z.string().min(1)).default([]),
      typing_delay_ms: z.number().int().nonnegative().default(25),
    })
  ),
  state: section(
    z.object({
      file: z.string().min(1).default('state/applied.json'),
    })
  ),
  answers: z.preprocess((value) => value ?? [], z.array(answerSchema)),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseConfig(text: string, source = 'config'): BotConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(`Could not parse ${source}: ${error.message}`);
    }
    throw error;
  }

  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(configPath: string): BotConfig {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config not found: ${configPath}`);
  }

  return parseConfig(fs.readFileSync(absolutePath, 'utf-8'), configPath);
}

// Pacing for synthetic input against the live session
export const HUMAN_CONFIG = {
  // Delay ranges in milliseconds
  minActionDelay: 300,
  maxActionDelay: 800,

  // Mouse movement
  mouseMovementSteps: 15,

  // Fixed waits lifted from how long LinkedIn takes to settle
  cardSettleDelay: 1000,
  modalStepDelay: 500,
  suggestionDelay: 300,
  emptyListDelay: 3000,
  modalPollInterval: 500,
};
