import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import {
  API_KEY_ENV,
  BackendConfig,
  ConfigError,
  PROVIDERS,
  QualityConfig,
  ReviewLogger,
  errorMessage,
} from '@review-gate/core';

export const DEFAULT_CONFIG_FILE = 'review-gate.config.json';

export const DEFAULT_FAIL_KEYWORDS = ['TODO', 'FIXME', 'HACK', 'console.log', 'print('];

export const DEFAULT_TEST_PATTERNS = [
  'test_*.py',
  '*_test.py',
  '*.test.js',
  '*.spec.js',
  '*.test.ts',
  '*.spec.ts',
  'test/*.py',
  'tests/*.py',
  '__tests__/*',
  'spec/*',
];

const configSchema = z.object({
  jira: z
    .object({
      server: z.string().url().optional(),
    })
    .default({}),
  ai: z
    .object({
      provider: z.enum(PROVIDERS).default('anthropic'),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      maxTokens: z.number().int().positive().default(2000),
      timeoutMs: z.number().int().positive().default(60_000),
      maxRetries: z.number().int().nonnegative().default(1),
    })
    .default({}),
  review: z
    .object({
      failKeywords: z.array(z.string()).default(DEFAULT_FAIL_KEYWORDS),
      testPatterns: z.array(z.string()).default(DEFAULT_TEST_PATTERNS),
    })
    .default({}),
});

export type ReviewGateConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  path?: string;
  cwd?: string;
  logger?: ReviewLogger;
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseConfig(value: unknown, source: string): ReviewGateConfig {
  const result = configSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues;
    const details = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(
      `Invalid configuration in ${source}: ${details}`,
      issues.map((issue) => issue.path.join('.')),
    );
  }
  return result.data;
}

/**
 * Load and validate the JSON config file. A missing default file yields the
 * built-in defaults with a warning.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ReviewGateConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error) && options.path === undefined) {
      options.logger?.warn(`${DEFAULT_CONFIG_FILE} not found, using defaults`);
      return parseConfig({}, 'defaults');
    }
    if (isFileNotFound(error)) {
      throw new ConfigError(`Config file not found: ${filePath}`, ['config']);
    }
    throw new ConfigError(`Could not read config file ${filePath}: ${errorMessage(error)}`, ['config']);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, ['config']);
  }

  options.logger?.debug(`Loaded configuration from ${filePath}`);
  return parseConfig(json, filePath);
}

// ── Credentials ──

export interface CredentialNeeds {
  jira?: boolean;
  github?: boolean;
  ai?: boolean;
}

export interface JiraCredentials {
  server: string;
  username: string;
  token: string;
}

export type Environment = Record<string, string | undefined>;

function jiraServer(config: ReviewGateConfig, env: Environment): string | undefined {
  return env.JIRA_SERVER || config.jira.server;
}

/**
 * Names of every environment variable the given needs require but the
 * environment lacks.
 */
export function missingSettings(config: ReviewGateConfig, needs: CredentialNeeds, env: Environment): string[] {
  const missing: string[] = [];

  if (needs.jira) {
    if (!jiraServer(config, env)) missing.push('JIRA_SERVER');
    if (!env.JIRA_USERNAME) missing.push('JIRA_USERNAME');
    if (!env.JIRA_TOKEN) missing.push('JIRA_TOKEN');
  }
  if (needs.github && !env.GITHUB_TOKEN) {
    missing.push('GITHUB_TOKEN');
  }
  if (needs.ai && config.ai.provider !== 'ollama') {
    const variable = API_KEY_ENV[config.ai.provider];
    if (!env[variable]) missing.push(variable);
  }

  return missing;
}

function missingCredentialsError(missing: string[]): ConfigError {
  return new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, missing);
}

/** Report all missing credentials at once, before any work starts. */
export function assertCredentials(
  config: ReviewGateConfig,
  needs: CredentialNeeds,
  env: Environment = process.env,
): void {
  const missing = missingSettings(config, needs, env);
  if (missing.length > 0) throw missingCredentialsError(missing);
}

export function jiraCredentials(config: ReviewGateConfig, env: Environment = process.env): JiraCredentials {
  const server = jiraServer(config, env);
  const { JIRA_USERNAME: username, JIRA_TOKEN: token } = env;
  if (server && username && token) {
    return { server, username, token };
  }
  throw missingCredentialsError(missingSettings(config, { jira: true }, env));
}

export function githubToken(env: Environment = process.env): string {
  const token = env.GITHUB_TOKEN;
  if (!token) throw missingCredentialsError(['GITHUB_TOKEN']);
  return token;
}

export function backendConfig(config: ReviewGateConfig, env: Environment = process.env): BackendConfig {
  const { ai } = config;
  return {
    provider: ai.provider,
    model: ai.model,
    baseUrl: ai.baseUrl,
    apiKey: ai.provider === 'ollama' ? undefined : env[API_KEY_ENV[ai.provider]],
    maxTokens: ai.maxTokens,
    timeoutMs: ai.timeoutMs,
    maxRetries: ai.maxRetries,
  };
}

export function qualityConfig(config: ReviewGateConfig): QualityConfig {
  return {
    failKeywords: config.review.failKeywords,
    testPatterns: config.review.testPatterns,
  };
}
