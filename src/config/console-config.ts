import fs from 'node:fs/promises';
import { err, ok, type Result, ResultAsync } from 'neverthrow';
import YAML from 'yaml';
import { DEFAULT_CALL_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS } from '../services/daemon-client';
import { DEFAULT_TICK_INTERVAL_MS } from '../services/event-source';
import { isEmpty, isPositiveInteger } from '../utils/validators';

export const DEFAULT_ADDRESS = '127.0.0.1:50051';

export type ConsoleConfig = {
  address?: string;
  tickIntervalMs: number;
  connectTimeoutMs: number;
  callTimeoutMs: number;
  logKeepSessions: number;
};

export const DEFAULT_CONFIG: ConsoleConfig = {
  tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
  logKeepSessions: 5,
};

export type ConfigError = { path?: string; message: string };

const NUMERIC_KEYS = ['tickIntervalMs', 'connectTimeoutMs', 'callTimeoutMs', 'logKeepSessions'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeErrorWithCode(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Parse the YAML config. Unknown keys are ignored and a value of the wrong
 * shape falls back to its default; only unreadable YAML is an error.
 */
export function parseConsoleConfig(text: string): Result<ConsoleConfig, ConfigError> {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (error) {
    return err({ message: error instanceof Error ? error.message : String(error) });
  }

  if (doc === null || doc === undefined) return ok({ ...DEFAULT_CONFIG });
  if (!isRecord(doc)) return err({ message: 'Config must be a YAML mapping' });

  const config: ConsoleConfig = { ...DEFAULT_CONFIG };
  const address = doc.address;
  if (typeof address === 'string' && address.trim() !== '') config.address = address.trim();
  for (const key of NUMERIC_KEYS) {
    const value = doc[key];
    if (isPositiveInteger(value)) config[key] = value;
  }
  return ok(config);
}

/** A missing file is not an error: it reads as an empty config. */
export function readConsoleConfig(path: string): ResultAsync<ConsoleConfig, ConfigError> {
  const text = fs.readFile(path, 'utf8').catch((error: unknown) => {
    if (isNodeErrorWithCode(error) && error.code === 'ENOENT') return '';
    throw error;
  });
  return ResultAsync.fromPromise(text, (error) => ({
    path,
    message: error instanceof Error ? error.message : String(error),
  })).andThen((contents) => parseConsoleConfig(contents).mapErr((e) => ({ ...e, path })));
}

/** Command line argument first, then the config file, then the local default. */
export function resolveAddress(cliArg: string | undefined, config: ConsoleConfig): string {
  if (cliArg !== undefined && !isEmpty(cliArg)) return cliArg.trim();
  return config.address ?? DEFAULT_ADDRESS;
}
