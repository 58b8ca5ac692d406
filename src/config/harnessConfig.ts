// Configuration loader for the harness
// Loads from environment variables with defaults
import dotenv from 'dotenv';

export const DEFAULT_COMMAND = 'go';
export const DEFAULT_ARGS = ['run', 'voluspa.go'];
export const DEFAULT_TIMEOUT_MS = 10 * 1000;

export interface HarnessConfig {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
  verbose: boolean;
}

function parseTimeout(raw: string | undefined): number {
  const value = Number(raw);
  if (!raw || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }
  return Math.floor(value);
}

function parseArgs(raw: string | undefined): string[] {
  if (raw === undefined) {
    return [...DEFAULT_ARGS];
  }
  return raw.split(/\s+/).filter(arg => arg !== '');
}

function parseFlag(raw: string | undefined): boolean {
  return raw === 'true' || raw === '1';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  return {
    command: env.ROLLCALL_COMMAND || DEFAULT_COMMAND,
    args: parseArgs(env.ROLLCALL_ARGS),
    cwd: env.ROLLCALL_CWD || process.cwd(),
    timeoutMs: parseTimeout(env.ROLLCALL_TIMEOUT_MS),
    verbose: parseFlag(env.ROLLCALL_VERBOSE),
  };
}

/**
 * Load .env (if it exists) into process.env, then read the configuration
 */
export function loadConfigFromEnvironment(): HarnessConfig {
  dotenv.config();
  return loadConfig(process.env);
}
