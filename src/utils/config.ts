/**
 * Configuration loading and management for parcel-ledger
 *
 * Loads secrets from ~/.parcel-ledger/.env (then ./.env) and settings from
 * ~/.parcel-ledger/config.json, merged over defaults and validated with zod.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

dotenvConfig({ path: join(homedir(), '.parcel-ledger', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.PARCEL_LEDGER_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.parcel-ledger');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.PARCEL_LEDGER_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'config.json');
}

// =============================================================================
// SCHEMA
// =============================================================================

const phraseList = z.array(z.string().min(1)).optional();

const rateLimitSchema = z.object({
  maxRequests: z.number().int().positive(),
  windowMs: z.number().int().positive(),
});

export const configSchema = z.object({
  shopify: z
    .object({
      shopDomain: z.string().default(''),
      accessToken: z.string().default(''),
      apiVersion: z.string().default('2024-10'),
    })
    .default({}),
  ledger: z
    .object({
      backend: z.enum(['sheets', 'sqlite']).default('sheets'),
      spreadsheetId: z.string().default(''),
      sheetName: z.string().default('Sheet1'),
      sheetId: z.number().int().nonnegative().default(0),
      /** Path to the Google service-account JSON key */
      credentialsPath: z.string().default(''),
      sqlitePath: z.string().default(''),
    })
    .default({}),
  classifier: z
    .object({
      apiKey: z.string().default(''),
      model: z.string().default('claude-3-5-haiku-20241022'),
      timeoutMs: z.number().int().positive().default(60_000),
      maxAttempts: z.number().int().positive().default(2),
      maxTokens: z.number().int().positive().default(150),
    })
    .default({}),
  sync: z
    .object({
      batchSize: z.number().int().positive().default(50),
      staleAfterHours: z.number().positive().default(24),
      transitFollowUpDays: z.number().positive().default(5),
      lookbackDays: z.number().int().positive().default(30),
      watchIntervalMinutes: z.number().positive().default(30),
    })
    .default({}),
  tags: z
    .object({
      cancelled: phraseList,
      whatsAppSent: phraseList,
      confirmed: phraseList,
      didNotPickUp: phraseList,
      invalidWhatsApp: phraseList,
      awaitingCall: phraseList,
      noAnswer: phraseList,
      callCompleted: phraseList,
      sizeConfirmed: phraseList,
    })
    .default({}),
  couriers: z
    .array(
      z.object({
        name: z.string().min(1),
        detectionUrl: z.string().min(1),
        apiEndpoint: z.string().min(1),
        queryParameters: z.array(z.string()).default([]),
        enabled: z.boolean().default(true),
      }),
    )
    .default([]),
  http: z
    .object({
      enabled: z.boolean().optional(),
      defaultRateLimit: rateLimitSchema.optional(),
      perHost: z.record(rateLimitSchema).optional(),
      requestTimeoutMs: z.number().int().positive().optional(),
      retry: z
        .object({
          enabled: z.boolean().optional(),
          maxAttempts: z.number().int().positive().optional(),
          minDelay: z.number().nonnegative().optional(),
          maxDelay: z.number().nonnegative().optional(),
          jitter: z.number().min(0).max(1).optional(),
          backoffMultiplier: z.number().positive().optional(),
          methods: z.array(z.string()).optional(),
        })
        .optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/** Secrets default to environment variables; the JSON file may override them. */
const DEFAULT_RAW_CONFIG = {
  shopify: {
    shopDomain: '${SHOPIFY_SHOP_DOMAIN}',
    accessToken: '${SHOPIFY_ACCESS_TOKEN}',
  },
  ledger: {
    spreadsheetId: '${PARCEL_LEDGER_SPREADSHEET_ID}',
    credentialsPath: '${GOOGLE_APPLICATION_CREDENTIALS}',
  },
  classifier: {
    apiKey: '${ANTHROPIC_API_KEY}',
  },
};

// =============================================================================
// LOADING
// =============================================================================

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file, using defaults and environment');
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${configPath}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Validate an already-assembled raw config object.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Load configuration from file and environment
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const configPath = customPath ? resolveUserPath(customPath) : resolveConfigPath(env);
  const fileConfig = readConfigFile(configPath);
  const merged = deepMerge(DEFAULT_RAW_CONFIG, fileConfig);
  const config = parseConfig(substituteEnvVars(merged, env));
  logger.debug({ configPath, backend: config.ledger.backend }, 'Configuration loaded');
  return config;
}

/**
 * List what is missing before a sync can run against live services.
 */
export function checkSyncReadiness(config: Config): string[] {
  const missing: string[] = [];
  if (!config.shopify.shopDomain) missing.push('shopify.shopDomain (SHOPIFY_SHOP_DOMAIN)');
  if (!config.shopify.accessToken) missing.push('shopify.accessToken (SHOPIFY_ACCESS_TOKEN)');
  if (config.ledger.backend === 'sheets') {
    if (!config.ledger.spreadsheetId) missing.push('ledger.spreadsheetId (PARCEL_LEDGER_SPREADSHEET_ID)');
    if (!config.ledger.credentialsPath) missing.push('ledger.credentialsPath (GOOGLE_APPLICATION_CREDENTIALS)');
  }
  if (!config.classifier.apiKey) missing.push('classifier.apiKey (ANTHROPIC_API_KEY)');
  return missing;
}
