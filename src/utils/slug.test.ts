import { describe, it, expect, vi } from 'vitest';
import { slugify, uniqueSlug } from './slug';

describe('slugify', () => {
  it('lower-cases and joins words with dashes', () => {
    expect(slugify('  Drip Irrigation Basics  ')).toBe('drip-irrigation-basics');
  });

  it('strips accents and replaces ampersands', () => {
    expect(slugify('Café & Crème')).toBe('cafe-and-creme');
  });

  it('collapses runs of punctuation', () => {
    expect(slugify('Soil -- pH?! 101')).toBe('soil-ph-101');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(slugify('!!!')).toBe('');
  });
});

describe('uniqueSlug', () => {
  it('uses the base slug when it is free', async () => {
    const isTaken = vi.fn(async () => false);
    await expect(uniqueSlug('Crop Rotation', isTaken)).resolves.toBe('crop-rotation');
    expect(isTaken).toHaveBeenCalledTimes(1);
  });

  it('appends the first free numeric suffix', async () => {
    const taken = new Set(['crop-rotation', 'crop-rotation-1']);
    const isTaken = async (candidate: string) => taken.has(candidate);
    await expect(uniqueSlug('Crop Rotation', isTaken)).resolves.toBe('crop-rotation-2');
  });

  it('falls back when the text has no slug characters', async () => {
    await expect(uniqueSlug('???', async () => false, 'tip')).resolves.toBe('tip');
  });
});
