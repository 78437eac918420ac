import path from 'path';
import { z } from 'zod';
import { DEFAULT_HISTORY_LIMIT } from './lib/history';

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((v) => ['1', 'true', 'yes', 'on'].includes(v));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7860),
  DATA_DIR: z.string().min(1).default('memory'),
  LOG_DIR: z.string().min(1).default('logs'),
  RESOURCES_DIR: z.string().min(1).default('data'),
  HISTORY_LIMIT: z.coerce.number().int().min(1).max(1000).default(DEFAULT_HISTORY_LIMIT),
  SESSION_STORE: z.enum(['memory', 'file']).default('memory'),
  CRISIS_MESSAGE: z.string().optional(),
  TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).default(720),
  LOG_ECHO: flag.default('true'),
});

export type AppConfig = {
  port: number;
  dataDir: string;
  logDir: string;
  resourcesDir: string;
  historyLimit: number;
  sessionStore: 'memory' | 'file';
  crisisMessage?: string;
  tokenTtlMs: number;
  logEcho: boolean;
};

// Blank values in .env files mean "unset".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: path.resolve(cwd, e.DATA_DIR),
    logDir: path.resolve(cwd, e.LOG_DIR),
    resourcesDir: path.resolve(cwd, e.RESOURCES_DIR),
    historyLimit: e.HISTORY_LIMIT,
    sessionStore: e.SESSION_STORE,
    crisisMessage: e.CRISIS_MESSAGE,
    tokenTtlMs: e.TOKEN_TTL_MINUTES * 60_000,
    logEcho: e.LOG_ECHO,
  };
}
