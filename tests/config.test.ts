import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, defaultResourcesPath, CONFIG_FILE_NAME } from '../src/config.js';
import { InvalidConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'eu-ai-act-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown, name = CONFIG_FILE_NAME): string {
    const path = join(dir, name);
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  it('uses the defaults when nothing is set', () => {
    const config = loadConfig({ env: {}, cwd: dir });
    expect(config.resources_path).toBe(defaultResourcesPath());
    expect(config.scoring).toEqual({
      base_url: 'https://sonnylabs-service.onrender.com',
      api_token: null,
      analysis_id: null,
      timeout_ms: 10000,
    });
    expect(config.proxy.threshold).toBe(0.65);
    expect(config.api).toEqual({ host: '0.0.0.0', port: 8000 });
    expect(config.plugins.disabled).toEqual([]);
  });

  it('reads the config file from the working directory', () => {
    writeConfig({ proxy: { threshold: 0.8, block_unverified: true }, api: { port: 9000 } });
    const config = loadConfig({ env: {}, cwd: dir });
    expect(config.proxy).toEqual({
      local_api_url: 'http://localhost:8000',
      threshold: 0.8,
      block_injections: true,
      block_unverified: true,
    });
    expect(config.api.port).toBe(9000);
  });

  it('lets the environment override the file', () => {
    writeConfig({ api: { port: 9000 }, plugins: { disabled: ['deepfake'] } });
    const config = loadConfig({
      cwd: dir,
      env: {
        API_PORT: '9100',
        SCORING_API_TOKEN: ' test-secret ',
        SCORING_ANALYSIS_ID: 'analysis-1',
        EU_AI_ACT_DISABLED_PLUGINS: 'security, watermarking ,',
      },
    });
    expect(config.api.port).toBe(9100);
    expect(config.scoring.api_token).toBe('test-secret');
    expect(config.scoring.analysis_id).toBe('analysis-1');
    expect(config.plugins.disabled).toEqual(['security', 'watermarking']);
  });

  it('treats blank environment values as unset', () => {
    const config = loadConfig({ cwd: dir, env: { SCORING_API_TOKEN: '   ', API_HOST: '' } });
    expect(config.scoring.api_token).toBeNull();
    expect(config.api.host).toBe('0.0.0.0');
  });

  it('turns the local API off with a blank LOCAL_API_URL', () => {
    const config = loadConfig({ cwd: dir, env: { LOCAL_API_URL: ' ' } });
    expect(config.proxy.local_api_url).toBeNull();
  });

  it('turns the local API off with null in the config file', () => {
    writeConfig({ proxy: { local_api_url: null } });
    const config = loadConfig({ cwd: dir, env: {} });
    expect(config.proxy.local_api_url).toBeNull();
  });

  it('resolves a relative resources path against the working directory', () => {
    const config = loadConfig({ cwd: dir, env: { EU_AI_ACT_RESOURCES_PATH: 'templates' } });
    expect(config.resources_path).toBe(join(dir, 'templates'));
  });

  it('loads an explicit config path from EU_AI_ACT_CONFIG', () => {
    writeConfig({ scoring: { timeout_ms: 2500 } }, 'custom.json');
    const config = loadConfig({ cwd: dir, env: { EU_AI_ACT_CONFIG: 'custom.json' } });
    expect(config.scoring.timeout_ms).toBe(2500);
  });

  it('fails when an explicit config file is missing', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'absent.json' }))
      .toThrow(`Config file not found: ${join(dir, 'absent.json')}`);
  });

  it('rejects malformed JSON', () => {
    writeConfig('{ "api": ');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(InvalidConfigError);
  });

  it('rejects unknown keys', () => {
    writeConfig({ scoring: { token: 'test-secret' } });
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(InvalidConfigError);
  });

  it('rejects an out-of-range threshold', () => {
    writeConfig({ proxy: { threshold: 2 } });
    expect(() => loadConfig({ cwd: dir, env: {} }))
      .toThrow(`Invalid ${join(dir, CONFIG_FILE_NAME)}: proxy.threshold: Number must be less than or equal to 1`);
  });

  it('rejects a non-integer port from the environment', () => {
    expect(() => loadConfig({ cwd: dir, env: { API_PORT: 'eighty' } }))
      .toThrow("API_PORT must be an integer, got 'eighty'");
  });

  it('rejects an invalid base URL after merging', () => {
    expect(() => loadConfig({ cwd: dir, env: { SCORING_BASE_URL: 'not a url' } }))
      .toThrow('Invalid configuration: scoring.base_url: Invalid url');
  });
});
