/**
 * Capture config: explicit construction, YAML file, env overrides, fallbacks.
 */

import path from 'path';
import { diag, DiagLogLevel, type DiagLogger } from '@opentelemetry/api';

import {
  ConfigManager,
  createCaptureConfig,
  DEFAULT_MAX_BODY_SIZE,
  ENV_CAPTURE_REQUEST_BODY,
  ENV_CAPTURE_RESPONSE_BODY,
  ENV_MAX_BODY_SIZE,
  loadCaptureConfig,
  resolveCaptureConfig,
} from '../config/config-manager';

const FIXTURE_PATH = path.join(__dirname, 'fixtures', 'capture-config.yml');
const INVALID_FIXTURE_PATH = path.join(__dirname, 'fixtures', 'invalid-size-config.yml');

describe('createCaptureConfig', () => {
  it('defaults to capture off with a 4096-byte cap', () => {
    expect(createCaptureConfig()).toEqual({
      captureRequestBody: false,
      captureResponseBody: false,
      maxBodySize: 4096,
    });
    expect(DEFAULT_MAX_BODY_SIZE).toBe(4096);
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(createCaptureConfig({ captureRequestBody: true }))).toBe(true);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects maxBodySize %p', (maxBodySize) => {
    expect(() => createCaptureConfig({ maxBodySize })).toThrow('maxBodySize must be a positive integer');
  });
});

describe('ConfigManager', () => {
  it('reads the http-client section from YAML', () => {
    const manager = new ConfigManager(FIXTURE_PATH);

    expect(manager.getHttpClientSection()).toEqual({
      'capture-request-body': true,
      'capture-response-body': false,
      'max-body-size': 8192,
    });
    expect(manager.getCaptureConfig({})).toEqual({
      captureRequestBody: true,
      captureResponseBody: false,
      maxBodySize: 8192,
    });
  });

  it('lets environment variables override file values', () => {
    const manager = new ConfigManager(FIXTURE_PATH);

    const cfg = manager.getCaptureConfig({
      [ENV_CAPTURE_REQUEST_BODY]: 'false',
      [ENV_CAPTURE_RESPONSE_BODY]: 'true',
      [ENV_MAX_BODY_SIZE]: '1024',
    });

    expect(cfg).toEqual({ captureRequestBody: false, captureResponseBody: true, maxBodySize: 1024 });
  });

  it('falls back to the default size for invalid values and reads string flags', () => {
    const manager = new ConfigManager(INVALID_FIXTURE_PATH);

    expect(manager.getCaptureConfig({})).toEqual({
      captureRequestBody: false,
      captureResponseBody: true,
      maxBodySize: DEFAULT_MAX_BODY_SIZE,
    });
  });
});

describe('resolveCaptureConfig', () => {
  afterEach(() => {
    diag.disable();
  });

  it('treats anything other than "true" as false', () => {
    const cfg = resolveCaptureConfig({}, { [ENV_CAPTURE_REQUEST_BODY]: 'yes', [ENV_CAPTURE_RESPONSE_BODY]: ' True ' });

    expect(cfg.captureRequestBody).toBe(false);
    expect(cfg.captureResponseBody).toBe(true);
  });

  it('warns through diag when the size is not a positive integer', () => {
    const warn = jest.fn();
    const logger: DiagLogger = { error: jest.fn(), warn, info: jest.fn(), debug: jest.fn(), verbose: jest.fn() };
    diag.setLogger(logger, DiagLogLevel.WARN);

    const cfg = resolveCaptureConfig({}, { [ENV_MAX_BODY_SIZE]: 'lots' });

    expect(cfg.maxBodySize).toBe(DEFAULT_MAX_BODY_SIZE);
    expect(warn).toHaveBeenCalledWith(
      'http-entity-recorder',
      `Ignoring invalid max-body-size from ${ENV_MAX_BODY_SIZE}: lots; using default`
    );
  });
});

describe('loadCaptureConfig', () => {
  it('uses env and defaults when the file does not exist', () => {
    const cfg = loadCaptureConfig(path.join(__dirname, 'fixtures', 'missing.yml'), {
      [ENV_CAPTURE_RESPONSE_BODY]: 'true',
    });

    expect(cfg).toEqual({ captureRequestBody: false, captureResponseBody: true, maxBodySize: 4096 });
  });

  it('reads the file when present', () => {
    expect(loadCaptureConfig(FIXTURE_PATH, {}).maxBodySize).toBe(8192);
  });
});
