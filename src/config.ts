import { config as loadDotenv } from 'dotenv';
import { DEFAULT_GRACE_MS } from './tracer/correlation.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

export interface TapeConfig {
  traceFile: string;
  graceMs: number;
  port: number;
  logLevel: LogLevel;
}

export const DEFAULT_TRACE_FILE = './traces/sessions.jsonl';
export const DEFAULT_PORT = 3000;

/** A TCP port from 0 to 65535, or undefined when the text is not one */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const port = parseInt(value, 10);
  return port <= 65535 ? port : undefined;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/**
 * Resolve settings from the environment, after loading `.env` if present.
 * Variables already set in the shell take precedence over `.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, dotenv = true): TapeConfig {
  if (dotenv) {
    loadDotenv();
  }

  const level = env.MCP_TAPE_LOG_LEVEL ?? 'info';

  return {
    traceFile: env.MCP_TAPE_TRACE || DEFAULT_TRACE_FILE,
    graceMs: parseNumber(env.MCP_TAPE_GRACE_MS, DEFAULT_GRACE_MS),
    port: parsePort(env.MCP_TAPE_PORT) ?? DEFAULT_PORT,
    logLevel: isLogLevel(level) ? level : 'info',
  };
}
