import { describe, test, expect } from 'vitest';
import { loadEnvConfig, resolveEngineConfig } from '../config';
import { ConfigError } from '../errors';
import { DEFAULT_OVERLAP_POLICY } from '../overlapPolicy';

describe('resolveEngineConfig', () => {
  test('defaults to the balanced preset', () => {
    const config = resolveEngineConfig();
    expect(config).toMatchObject({
      mode: 'balanced',
      maxIterations: 5,
      maxComposeAttempts: 3,
      enableCritique: true,
      maxConcurrentAssets: 4,
      verbose: true
    });
    expect(config.validator).toEqual({ minSpacing: 20, minTextGap: 30, overlapPolicy: DEFAULT_OVERLAP_POLICY });
    expect(config.repair.overlap).toEqual({ minSpacing: 40, margin: 40, fontShrinkFactor: 0.8, minFontSize: 24 });
  });

  test('fast mode drops the critic but keeps the iteration cap', () => {
    expect(resolveEngineConfig({ mode: 'fast' })).toMatchObject({ enableCritique: false, maxComposeAttempts: 1, maxIterations: 5 });
  });

  test('strict mode tightens spacing and keeps untouched nested defaults', () => {
    const config = resolveEngineConfig({ mode: 'strict' });
    expect(config.validator).toMatchObject({ minSpacing: 24, minTextGap: 40 });
    expect(config.validator.overlapPolicy).toBe(DEFAULT_OVERLAP_POLICY);
    expect(config.repair).toMatchObject({ minWidth: 50, minHeight: 20 });
    expect(config.repair.overlap).toEqual({ minSpacing: 48, margin: 48, fontShrinkFactor: 0.8, minFontSize: 24 });
  });

  test('applies overrides on top of the preset', () => {
    const config = resolveEngineConfig({ mode: 'strict', maxIterations: 3, repair: { overlap: { minFontSize: 18 } } });
    expect(config.maxIterations).toBe(3);
    expect(config.repair.overlap).toMatchObject({ minSpacing: 48, minFontSize: 18 });
  });

  test('ignores undefined overrides', () => {
    expect(resolveEngineConfig({ maxIterations: undefined, validator: { minSpacing: undefined } })).toMatchObject({
      maxIterations: 5,
      validator: { minSpacing: 20 }
    });
  });

  test('rejects a non-positive iteration cap', () => {
    expect(() => resolveEngineConfig({ maxIterations: 0 })).toThrow(ConfigError);
    expect(() => resolveEngineConfig({ maxConcurrentAssets: 1.5 })).toThrow(ConfigError);
  });
});

describe('loadEnvConfig', () => {
  test('fills model defaults', () => {
    expect(loadEnvConfig({})).toEqual({
      GEMINI_MODEL: 'gemini-2.5-flash',
      GEMINI_FALLBACK_MODEL: 'gemini-2.0-flash',
      GEMINI_TIMEOUT_MS: 180000
    });
  });

  test('coerces the timeout', () => {
    expect(loadEnvConfig({ GEMINI_API_KEY: 'test-secret', GEMINI_TIMEOUT_MS: '5000' })).toMatchObject({
      GEMINI_API_KEY: 'test-secret',
      GEMINI_TIMEOUT_MS: 5000
    });
  });

  test('rejects an invalid timeout', () => {
    expect(() => loadEnvConfig({ GEMINI_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });
});
