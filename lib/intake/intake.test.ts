import { describe, it, expect } from 'vitest';
import { collectBrandProfile, collectBusinessProfile, selectPlatforms } from './index';
import { ContextStore } from '@/lib/pipeline';
import { PROFESSIONAL_BRAND, TECH_BUSINESS } from '@/lib/testing/fixtures';

describe('collectBusinessProfile', () => {
  it('trims, freezes and stores the profile', () => {
    const store = new ContextStore();

    const result = collectBusinessProfile(store, { ...TECH_BUSINESS, industry: '  Technology ' });

    expect(result.status).toBe('success');
    expect(result.message).toBe('Business information collected successfully');
    expect(store.get('business')?.industry).toBe('Technology');
    expect(Object.isFrozen(store.get('business'))).toBe(true);
    expect(store.writerOf('business')).toBe('intake');
  });

  it('rejects blank fields without writing', () => {
    const store = new ContextStore();

    const result = collectBusinessProfile(store, { ...TECH_BUSINESS, industry: '   ' });

    expect(result).toEqual({
      status: 'error',
      message: 'Invalid business profile: industry: industry must not be empty',
      error: { kind: 'validation', details: ['industry: industry must not be empty'] },
    });
    expect(store.has('business')).toBe(false);
  });

  it('reports a profile written by someone else instead of throwing', () => {
    const store = new ContextStore();
    store.set('business', { ...TECH_BUSINESS, industry: 'Retail' });

    const result = collectBusinessProfile(store, TECH_BUSINESS);

    expect(result).toEqual({
      status: 'error',
      message: 'intake cannot overwrite artifacts owned by another writer',
      error: { kind: 'validation', details: ['business: owned by external'] },
    });
    expect(store.get('business')?.industry).toBe('Retail');
  });

  it('names missing fields', () => {
    const store = new ContextStore();
    const result = collectBusinessProfile(store, {
      industry: 'Technology',
      targetAudience: 'Developers',
      businessGoals: 'Grow',
    });

    expect(result.status).toBe('error');
    if (result.status === 'success') return;
    expect(result.error.details).toEqual(['currentChallenges: currentChallenges is required']);
  });
});

describe('collectBrandProfile', () => {
  it('stores the brand personality', () => {
    const store = new ContextStore();

    const result = collectBrandProfile(store, PROFESSIONAL_BRAND);

    expect(result.message).toBe('Brand personality assessment completed successfully');
    expect(store.get('brand')?.voice).toBe('Professional and authoritative');
  });
});

describe('selectPlatforms', () => {
  it('defaults priorities and returns guidance for the selection only', () => {
    const store = new ContextStore();

    const result = selectPlatforms(store, { platforms: ['LinkedIn'] });
    if (result.status === 'error') throw new Error(result.message);

    expect(result.message).toBe('Platform selection completed for 1 platform(s)');
    expect(store.get('platforms')).toEqual({
      platforms: ['LinkedIn'],
      priorities: 'Equal focus on all selected platforms',
    });
    expect(Object.keys(result.data.guidance)).toEqual(['LinkedIn']);
  });

  it('rejects an empty selection', () => {
    const store = new ContextStore();

    const result = selectPlatforms(store, { platforms: [] });

    expect(result.status).toBe('error');
    if (result.status === 'success') return;
    expect(result.error.details).toEqual(['platforms: At least one platform must be selected']);
    expect(store.has('platforms')).toBe(false);
  });

  it('rejects repeated platforms', () => {
    const store = new ContextStore();

    const result = selectPlatforms(store, { platforms: ['Instagram', 'Instagram'] });

    expect(result.status).toBe('error');
    if (result.status === 'success') return;
    expect(result.error.details).toEqual(['platforms: Platforms must not repeat']);
  });

  it('rejects platforms outside the supported set', () => {
    const store = new ContextStore();

    const result = selectPlatforms(store, { platforms: ['MySpace'] });

    expect(result.status).toBe('error');
    if (result.status === 'success') return;
    expect(result.error.kind).toBe('validation');
  });
});
