import { describe, expect, it } from 'vitest';
import { AshbyAdapter } from './ashby';
import { GenericHeuristicAdapter } from './generic';
import { GreenhouseAdapter } from './greenhouse';
import { createDefaultRegistry } from './registry';
import { resolveBoardToken, slugFromDomain } from './tokens';

describe('AdapterRegistry', () => {
  const registry = createDefaultRegistry();

  it('registers one adapter per platform', () => {
    expect(registry.platforms()).toEqual(['greenhouse', 'lever', 'ashby', 'custom']);
  });

  it('resolves platforms case-insensitively', () => {
    expect(registry.resolve('Greenhouse')).toBeInstanceOf(GreenhouseAdapter);
    expect(registry.resolve('ashby')).toBeInstanceOf(AshbyAdapter);
    expect(registry.resolve('custom')).toBeInstanceOf(GenericHeuristicAdapter);
  });

  it('returns undefined for unknown or missing platforms', () => {
    expect(registry.resolve('workday')).toBeUndefined();
    expect(registry.resolve(null)).toBeUndefined();
    expect(registry.resolve('')).toBeUndefined();
  });
});

describe('board tokens', () => {
  const base = { id: 'c1', name: 'Acme', careersUrl: null, boardToken: null };

  it('takes the first domain label as the slug', () => {
    expect(slugFromDomain('www.Linear.app')).toBe('linear');
    expect(slugFromDomain(null)).toBeNull();
  });

  it('only uses the token table for Greenhouse', () => {
    expect(resolveBoardToken({ ...base, domain: 'together.ai', careersPlatform: 'greenhouse' })).toBe('togetherai');
    expect(resolveBoardToken({ ...base, domain: 'together.ai', careersPlatform: 'lever' })).toBe('together');
    expect(resolveBoardToken({ ...base, domain: 'acme.com', careersPlatform: 'greenhouse' })).toBeNull();
    expect(resolveBoardToken({ ...base, domain: 'acme.com', careersPlatform: 'greenhouse', boardToken: 'acme' })).toBe('acme');
    expect(resolveBoardToken({ ...base, domain: 'together.ai', careersPlatform: 'Greenhouse' })).toBe('togetherai');
    expect(resolveBoardToken({ ...base, domain: 'acme.com', careersPlatform: 'GREENHOUSE' })).toBeNull();
  });
});
