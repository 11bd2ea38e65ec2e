import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { InvalidConfigError } from '../util/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  decks: z.number().int().positive(),
  trials: z.number().int().positive(),
  workers: z.number().int().min(0), // 0 runs the simulator in-process
  seed: z.number().int().optional(),
  startCredits: z.number().int().positive(),
  startBet: z.number().int().positive(),
  betStep: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
  pretty: z.boolean(),
}).strict();

export type TrainerConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: TrainerConfig = {
  decks: 6,
  trials: 1000,
  workers: 0,
  startCredits: 1000,
  startBet: 100,
  betStep: 100,
  logLevel: 'info',
  pretty: true,
};

export const CONFIG_FILE = path.resolve(process.cwd(), 'config', 'trainer.json');

type Env = Record<string, string | undefined>;

let cfg: TrainerConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

function intFromEnv(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  return Number(v);
}

function boolFromEnv(v: string | undefined): boolean | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  return v === 'true' || v === '1';
}

function readFileConfig(file: string): Partial<TrainerConfig> {
  if (!fs.existsSync(file)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new InvalidConfigError(`cannot parse ${file}`, [String(err)]);
  }
  const parsed = configSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(`invalid ${file}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {
    decks: intFromEnv(env.BJT_DECKS),
    trials: intFromEnv(env.BJT_TRIALS),
    workers: intFromEnv(env.BJT_WORKERS),
    seed: intFromEnv(env.BJT_SEED),
    startCredits: intFromEnv(env.BJT_START_CREDITS),
    startBet: intFromEnv(env.BJT_START_BET),
    betStep: intFromEnv(env.BJT_BET_STEP),
    logLevel: env.LOG_LEVEL || undefined,
    pretty: boolFromEnv(env.BJT_PRETTY),
  };
  for (const k of Object.keys(overrides)) {
    if (overrides[k] === undefined) delete overrides[k];
  }
  return overrides;
}

/** Defaults, then `config/trainer.json`, then `BJT_*` environment variables. */
export function loadConfig(env: Env = process.env, file: string = CONFIG_FILE): TrainerConfig {
  const merged = { ...DEFAULT_CONFIG, ...readFileConfig(file), ...envOverrides(env) };
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigError('invalid trainer config', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function getConfig(): TrainerConfig {
  if (!cfg) cfg = loadConfig();
  return cfg;
}
