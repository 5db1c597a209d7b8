import { describe, it, expect } from 'vitest';
import { ConfigSchema } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});
    expect(config.reconcile).toEqual({
      maxAttempts: 3,
      complexityThreshold: 10,
      excerptRadius: 10,
      cleanExcerptRadius: 3,
      searchRadius: 200,
      revertStrategy: 'snapshot',
    });
    expect(config.generator.minIntervalMs).toBe(15_000);
    expect(config.generator.minOutputTokens).toBe(8192);
    expect(config.generator.maxOutputTokens).toBe(100_000);
    expect(config.validation.maxDriftRatio).toBe(1.5);
    expect(config.validation.commands).toEqual([]);
    expect(config.apply.gitPath).toBe('git');
  });

  it('keeps partial overrides and defaults the rest of the section', () => {
    const config = ConfigSchema.parse({ reconcile: { maxAttempts: 5 } });
    expect(config.reconcile.maxAttempts).toBe(5);
    expect(config.reconcile.excerptRadius).toBe(10);
  });

  it('rejects a zero attempt budget', () => {
    const result = ConfigSchema.safeParse({ reconcile: { maxAttempts: 0 } });
    expect(result.success).toBe(false);
  });

  it('passes unknown provider fields through', () => {
    const config = ConfigSchema.parse({
      providers: { claude: { type: 'anthropic', model: 'm', region: 'eu' } },
    });
    expect(config.providers?.claude).toEqual({ type: 'anthropic', model: 'm', region: 'eu' });
  });
});
