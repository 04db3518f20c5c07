/**
 * Capture configuration. A CaptureConfig is built once and handed to the
 * recorder; changing capture settings means building a new recorder.
 *
 * Sources, lowest precedence first: defaults, the YAML file
 * (instrumentation.http-client section), then OTEL_INSTRUMENTATION_HTTP_CLIENT_* env vars.
 */

import fs from 'fs';
import { parse } from 'yaml';
import { logger } from '../core/logger';

export const DEFAULT_CONFIG_PATH = './.otel/instrumentation.yml';
export const DEFAULT_MAX_BODY_SIZE = 4096;

export type CaptureConfig = {
  readonly captureRequestBody: boolean;
  readonly captureResponseBody: boolean;
  /** Byte cap before truncation; positive integer. */
  readonly maxBodySize: number;
};

/** Raw keys as they appear in the YAML section. */
export type HttpClientSection = {
  'capture-request-body'?: unknown;
  'capture-response-body'?: unknown;
  'max-body-size'?: unknown;
};

export const ENV_CAPTURE_REQUEST_BODY = 'OTEL_INSTRUMENTATION_HTTP_CLIENT_CAPTURE_REQUEST_BODY';
export const ENV_CAPTURE_RESPONSE_BODY = 'OTEL_INSTRUMENTATION_HTTP_CLIENT_CAPTURE_RESPONSE_BODY';
export const ENV_MAX_BODY_SIZE = 'OTEL_INSTRUMENTATION_HTTP_CLIENT_MAX_BODY_SIZE';

export type Env = Record<string, string | undefined>;

/**
 * Builds a frozen config; unspecified fields take their defaults.
 * Throws when maxBodySize is not a positive integer.
 */
export function createCaptureConfig(overrides: Partial<CaptureConfig> = {}): CaptureConfig {
  const maxBodySize = overrides.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
  if (!Number.isInteger(maxBodySize) || maxBodySize <= 0) {
    throw new Error(`maxBodySize must be a positive integer, got ${maxBodySize}`);
  }
  return Object.freeze({
    captureRequestBody: overrides.captureRequestBody ?? false,
    captureResponseBody: overrides.captureResponseBody ?? false,
    maxBodySize,
  });
}

/** Only `true` or the string "true" (any case) enable a flag. */
function parseFlag(value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  return String(value).trim().toLowerCase() === 'true';
}

function parseSize(value: unknown, source: string): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  logger.warn(`Ignoring invalid max-body-size from ${source}: ${String(value)}; using default`);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Resolves a config from an optional file section and environment. */
export function resolveCaptureConfig(section: HttpClientSection = {}, env: Env = {}): CaptureConfig {
  return createCaptureConfig({
    captureRequestBody:
      parseFlag(env[ENV_CAPTURE_REQUEST_BODY]) ?? parseFlag(section['capture-request-body']),
    captureResponseBody:
      parseFlag(env[ENV_CAPTURE_RESPONSE_BODY]) ?? parseFlag(section['capture-response-body']),
    maxBodySize:
      parseSize(env[ENV_MAX_BODY_SIZE], ENV_MAX_BODY_SIZE) ??
      parseSize(section['max-body-size'], 'config file'),
  });
}

/**
 * Reads and caches the instrumentation YAML file. Exposes the parsed document
 * via get() and the resolved capture settings via getCaptureConfig().
 * Accepts optional configPath for testing (fixture path).
 */
export class ConfigManager {
  private cfg: Record<string, unknown>;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    const raw = fs.readFileSync(configPath, 'utf8');
    const doc: unknown = parse(raw);
    this.cfg = isRecord(doc) ? doc : {};
  }

  /** Returns the parsed config object. */
  get(): Record<string, unknown> {
    return this.cfg;
  }

  /** Returns the instrumentation.http-client section, or an empty one. */
  getHttpClientSection(): HttpClientSection {
    const instrumentation = this.cfg.instrumentation;
    if (!isRecord(instrumentation)) return {};
    const section = instrumentation['http-client'];
    return isRecord(section) ? section : {};
  }

  getCaptureConfig(env: Env = process.env): CaptureConfig {
    return resolveCaptureConfig(this.getHttpClientSection(), env);
  }
}

/**
 * Loads the capture config from configPath and env. A missing file is not an
 * error: settings then come from env and defaults only.
 */
export function loadCaptureConfig(
  configPath: string = process.env.OTEL_INSTRUMENTATION_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
  env: Env = process.env
): CaptureConfig {
  if (!fs.existsSync(configPath)) {
    return resolveCaptureConfig({}, env);
  }
  return new ConfigManager(configPath).getCaptureConfig(env);
}
