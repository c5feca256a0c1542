/**
 * Configuration: defaults, then an optional eu-ai-act.config.json, then
 * environment variables. Built once at startup and passed explicitly.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { InvalidConfigError, describeError } from './errors.js';
import type { ComplianceConfig } from './types/index.js';

export const CONFIG_FILE_NAME = 'eu-ai-act.config.json';

/** resources/ beside src/ (dev) or dist/ (built). */
export function defaultResourcesPath(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return resolve(thisDir, '..', 'resources');
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const ScoringSchema = z.object({
  base_url: z.string().url(),
  api_token: z.string().min(1).nullable(),
  analysis_id: z.string().min(1).nullable(),
  timeout_ms: z.number().int().positive(),
});

const ProxySchema = z.object({
  local_api_url: z.string().url().nullable(),
  threshold: z.number().min(0).max(1),
  block_injections: z.boolean(),
  block_unverified: z.boolean(),
});

const ApiSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export const ComplianceConfigSchema = z.object({
  resources_path: z.string().min(1),
  scoring: ScoringSchema,
  proxy: ProxySchema,
  api: ApiSchema,
  plugins: z.object({ disabled: z.array(z.string()) }),
});

/** Every key optional; unknown keys are rejected so typos surface. */
const ConfigFileSchema = z.object({
  resources_path: z.string().min(1).optional(),
  scoring: ScoringSchema.partial().strict().optional(),
  proxy: ProxySchema.partial().strict().optional(),
  api: ApiSchema.partial().strict().optional(),
  plugins: z.object({ disabled: z.array(z.string()).optional() }).strict().optional(),
}).strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const DEFAULTS = {
  scoring: {
    base_url: 'https://sonnylabs-service.onrender.com',
    api_token: null,
    analysis_id: null,
    timeout_ms: 10_000,
  },
  proxy: {
    local_api_url: 'http://localhost:8000',
    threshold: 0.65,
    block_injections: true,
    block_unverified: false,
  },
  api: {
    host: '0.0.0.0',
    port: 8000,
  },
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit file path; a missing file is an error only when given here or via EU_AI_ACT_CONFIG. */
  configPath?: string;
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ComplianceConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const file = readConfigFile(options.configPath ?? env.EU_AI_ACT_CONFIG, cwd);
  const fromEnv = envOverrides(env);

  const merged = {
    resources_path: resolve(cwd, fromEnv.resources_path ?? file.resources_path ?? defaultResourcesPath()),
    scoring: overlay(DEFAULTS.scoring, file.scoring, fromEnv.scoring),
    proxy: overlay(DEFAULTS.proxy, file.proxy, fromEnv.proxy),
    api: overlay(DEFAULTS.api, file.api, fromEnv.api),
    plugins: { disabled: fromEnv.plugins?.disabled ?? file.plugins?.disabled ?? [] },
  };

  const parsed = ComplianceConfigSchema.safeParse(merged);
  if (!parsed.success) throw new InvalidConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

function readConfigFile(explicitPath: string | undefined, cwd: string): ConfigFile {
  const path = explicitPath ? resolve(cwd, explicitPath) : resolve(cwd, CONFIG_FILE_NAME);
  if (!existsSync(path)) {
    if (explicitPath) throw new InvalidConfigError(`Config file not found: ${path}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new InvalidConfigError(`Could not read ${path}: ${describeError(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidConfigError(`Invalid ${path}: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigFile {
  const disabled = nonEmpty(env.EU_AI_ACT_DISABLED_PLUGINS);
  return {
    resources_path: nonEmpty(env.EU_AI_ACT_RESOURCES_PATH),
    scoring: {
      base_url: nonEmpty(env.SCORING_BASE_URL),
      api_token: nonEmpty(env.SCORING_API_TOKEN),
      analysis_id: nonEmpty(env.SCORING_ANALYSIS_ID),
      timeout_ms: intFromEnv(env, 'SCORING_TIMEOUT_MS'),
    },
    proxy: {
      local_api_url: urlOrOff(env.LOCAL_API_URL),
    },
    api: {
      host: nonEmpty(env.API_HOST),
      port: intFromEnv(env, 'API_PORT'),
    },
    plugins: disabled === undefined
      ? undefined
      : { disabled: disabled.split(',').map((s) => s.trim()).filter((s) => s.length > 0) },
  };
}

/** Later layers win; undefined values never overwrite. */
function overlay(...layers: Array<Record<string, unknown> | undefined>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer ?? {})) {
      if (value !== undefined) out[key] = value;
    }
  }
  return out;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/** A set but blank value turns the endpoint off. */
function urlOrOff(value: string | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  return nonEmpty(value) ?? null;
}

function intFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = nonEmpty(env[key]);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new InvalidConfigError(`${key} must be an integer, got '${raw}'`);
  return n;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
