/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LogLevelSchema } from './logging/levels.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a friendly assistant for someone with ADHD. Help them capture, organise and finish tasks. ' +
  'Keep replies short and concrete. Use the available tools to read or change their task list, ' +
  'calendar and scratchpad instead of guessing.';

/**
 * Cloud chat-completion backend settings
 */
export const CloudConfigSchema = z.object({
  provider: z.enum(['openrouter', 'anthropic']).default('openrouter'),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  /** A reasoning model always gets the extended timeout */
  reasoningModel: z.boolean().default(false),
  timeoutMs: z.number().int().min(1).default(30000),
  complexTimeoutMs: z.number().int().min(1).default(300000),
  maxAttempts: z.number().int().min(1).default(2),
  retryDelayMs: z.number().int().min(0).default(500),
});

/**
 * Local model runtime settings. The runtime is reached through an
 * OpenAI-compatible endpoint on this machine.
 */
export const OnDeviceConfigSchema = z.object({
  baseURL: z.string().url().default('http://127.0.0.1:11434/v1'),
  model: z.string().min(1).default('llama3.2'),
  timeoutMs: z.number().int().min(1).default(120000),
  complexTimeoutMs: z.number().int().min(1).default(300000),
  maxAttempts: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(1000),
});

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default('warning'),
  historyFile: z.string().min(1).default('.focus/history.jsonl'),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  maxRecent: z.number().int().min(1).default(10),
  maxToolRounds: z.number().int().min(1).default(5),
  toolTimeoutMs: z.number().int().min(1).default(30000),
  /** JSON file with a custom ladder; the built-in ladder is used without it */
  ladderFile: z.string().min(1).optional(),
  /** Minutes between background task refinement passes; 0 turns them off */
  refineIntervalMinutes: z.number().int().min(0).default(0),
  cloud: CloudConfigSchema.default({}),
  onDevice: OnDeviceConfigSchema.default({}),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type CloudConfig = z.infer<typeof CloudConfigSchema>;
export type OnDeviceConfig = z.infer<typeof OnDeviceConfigSchema>;

type Environment = Record<string, string | undefined>;

/**
 * Parse a boolean from environment variable string
 */
function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable string. Garbage is passed
 * through as NaN so validation reports it instead of silently defaulting.
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

function parseString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Drop undefined values so schema defaults apply
 */
function defined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Load configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Environment = process.env): Config {
  const cloud = defined({
    provider: parseString(env['FOCUS_CLOUD_PROVIDER']),
    model: parseString(env['FOCUS_CLOUD_MODEL']),
    apiKey: parseString(env['FOCUS_CLOUD_API_KEY']),
    reasoningModel: parseBoolean(env['FOCUS_CLOUD_REASONING_MODEL']),
    timeoutMs: parseInteger(env['FOCUS_CLOUD_TIMEOUT_MS']),
    complexTimeoutMs: parseInteger(env['FOCUS_CLOUD_COMPLEX_TIMEOUT_MS']),
    maxAttempts: parseInteger(env['FOCUS_CLOUD_MAX_ATTEMPTS']),
    retryDelayMs: parseInteger(env['FOCUS_CLOUD_RETRY_DELAY_MS']),
  });

  const onDevice = defined({
    baseURL: parseString(env['FOCUS_ONDEVICE_BASE_URL']),
    model: parseString(env['FOCUS_ONDEVICE_MODEL']),
    timeoutMs: parseInteger(env['FOCUS_ONDEVICE_TIMEOUT_MS']),
    complexTimeoutMs: parseInteger(env['FOCUS_ONDEVICE_COMPLEX_TIMEOUT_MS']),
    maxAttempts: parseInteger(env['FOCUS_ONDEVICE_MAX_ATTEMPTS']),
    retryDelayMs: parseInteger(env['FOCUS_ONDEVICE_RETRY_DELAY_MS']),
  });

  const configInput = defined({
    logLevel: parseString(env['FOCUS_LOG_LEVEL']),
    historyFile: parseString(env['FOCUS_HISTORY_FILE']),
    systemPrompt: parseString(env['FOCUS_SYSTEM_PROMPT']),
    maxRecent: parseInteger(env['FOCUS_MAX_RECENT']),
    maxToolRounds: parseInteger(env['FOCUS_MAX_TOOL_ROUNDS']),
    toolTimeoutMs: parseInteger(env['FOCUS_TOOL_TIMEOUT_MS']),
    ladderFile: parseString(env['FOCUS_LADDER_FILE']),
    refineIntervalMinutes: parseInteger(env['FOCUS_REFINE_INTERVAL_MINUTES']),
  });
  configInput['cloud'] = cloud;
  configInput['onDevice'] = onDevice;

  const result = ConfigSchema.safeParse(configInput);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
