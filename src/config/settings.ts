/**
 * Settings
 * Environment-driven configuration, validated once at startup
 */

import { z } from 'zod';
import { ConfigError } from '../types/index.js';
import { DEFAULT_STATE_DIR } from '../state/file-store.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((value) => (value === undefined ? undefined : ['true', '1', 'yes'].includes(value)));

const EnvSchema = z.object({
  APP_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  A2A_SHARED_SECRET: z.string({ required_error: 'A2A_SHARED_SECRET is required' }).min(1, 'A2A_SHARED_SECRET is required'),

  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),

  STATE_BACKEND: z.enum(['memory', 'file']).default('memory'),
  STATE_DIR: z.string().default(DEFAULT_STATE_DIR),

  ENABLE_MONITORING: booleanFlag,
  MONITORING_EVENTS_FILE: optionalString,

  OPTIMIZATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TRACE_EXPORT_ENDPOINT: z.string().url().optional(),
});

export type Environment = z.input<typeof EnvSchema>;

export interface Settings {
  appEnv: 'development' | 'test' | 'production';
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  sharedSecret: string;
  providers: {
    groqApiKey?: string;
    openaiApiKey?: string;
    anthropicApiKey?: string;
    geminiApiKey?: string;
  };
  groqModel: string;
  geminiModel: string;
  stateBackend: 'memory' | 'file';
  stateDir: string;
  enableMonitoring: boolean;
  monitoringEventsFile?: string;
  optimizationTimeoutMs: number;
  traceExportEndpoint?: string;
}

/**
 * Read settings from `env`. Throws ConfigError listing every invalid variable.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    appEnv: parsed.APP_ENV,
    logLevel: parsed.LOG_LEVEL,
    sharedSecret: parsed.A2A_SHARED_SECRET,
    providers: {
      groqApiKey: parsed.GROQ_API_KEY,
      openaiApiKey: parsed.OPENAI_API_KEY,
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
      geminiApiKey: parsed.GEMINI_API_KEY,
    },
    groqModel: parsed.GROQ_MODEL,
    geminiModel: parsed.GEMINI_MODEL,
    stateBackend: parsed.STATE_BACKEND,
    stateDir: parsed.STATE_DIR,
    enableMonitoring: parsed.ENABLE_MONITORING ?? true,
    monitoringEventsFile: parsed.MONITORING_EVENTS_FILE,
    optimizationTimeoutMs: parsed.OPTIMIZATION_TIMEOUT_MS,
    traceExportEndpoint: parsed.TRACE_EXPORT_ENDPOINT,
  };
}
