/**
 * Centralized Flow Configuration
 *
 * Defaults for the orchestrator and logger, overridable through
 * FLOW_* environment variables or a .env file.
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { InvalidConfigError } from '../errors/flowErrors';

export type InputMode = 'original' | 'chained';
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

export interface FlowConfig {
  inputMode: InputMode;
  logLevel: LogLevel;
  logDir?: string;
}

const INPUT_MODES: readonly InputMode[] = ['original', 'chained'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'debug'];

export const FLOW_CONFIG = {
  /**
   * Every node receives the flow's original input unless a caller
   * opts into chaining.
   */
  inputMode: 'original',
  logLevel: process.env.NODE_ENV === 'production' ? 'warn' : 'debug',
} as const satisfies FlowConfig;

export interface LoadFlowConfigOptions {
  env?: NodeJS.ProcessEnv;
  /**
   * Path of a .env file; variables already present in env win. When
   * neither env nor envFile is given, `.env` in the working directory is
   * read if it exists.
   */
  envFile?: string;
}

export interface LogConfig {
  logLevel: LogLevel;
  logDir?: string;
}

function isInputMode(value: string): value is InputMode {
  return INPUT_MODES.some((mode) => mode === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultEnvFile(): string | undefined {
  const envPath = path.resolve(process.cwd(), '.env');
  return fs.existsSync(envPath) ? envPath : undefined;
}

function resolveEnv(options: LoadFlowConfigOptions): NodeJS.ProcessEnv {
  const baseEnv = options.env ?? process.env;
  const envFile = options.envFile ?? (options.env ? undefined : defaultEnvFile());
  if (!envFile) {
    return baseEnv;
  }
  return { ...dotenv.parse(fs.readFileSync(envFile)), ...baseEnv };
}

/**
 * FLOW_INPUT_MODE only; log settings are not looked at.
 */
export function loadInputMode(options: LoadFlowConfigOptions = {}): InputMode {
  const inputMode = resolveEnv(options).FLOW_INPUT_MODE ?? FLOW_CONFIG.inputMode;
  if (!isInputMode(inputMode)) {
    throw new InvalidConfigError('FLOW_INPUT_MODE', inputMode);
  }
  return inputMode;
}

/**
 * FLOW_LOG_LEVEL and FLOW_LOG_DIR only.
 */
export function loadLogConfig(options: LoadFlowConfigOptions = {}): LogConfig {
  const env = resolveEnv(options);

  const logLevel = env.FLOW_LOG_LEVEL ?? FLOW_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new InvalidConfigError('FLOW_LOG_LEVEL', logLevel);
  }

  const logDir = env.FLOW_LOG_DIR?.trim();
  return logDir ? { logLevel, logDir } : { logLevel };
}

/**
 * Build the effective configuration from defaults and environment.
 */
export function loadFlowConfig(options: LoadFlowConfigOptions = {}): FlowConfig {
  return {
    inputMode: loadInputMode(options),
    ...loadLogConfig(options),
  };
}
