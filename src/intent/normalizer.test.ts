import { describe, it, expect } from 'vitest';
import { normalize } from './normalizer.js';

describe('normalize', () => {
  it('lower-cases and trims', () => {
    expect(normalize('  TeSt PhRaSe  ')).toBe('test phrase');
  });

  it('keeps inner whitespace as-is', () => {
    expect(normalize('open   VS\tCode')).toBe('open   vs\tcode');
  });

  it('returns empty string for non-string input', () => {
    expect(normalize(123)).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize(undefined)).toBe('');
    expect(normalize({ text: 'open' })).toBe('');
  });

  it('returns empty string for whitespace-only input', () => {
    expect(normalize(' \n\t ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = ['  Jarvis OPEN Notepad.exe ', 'ÉCOLE', '', '   ', 'already normal', '\tMixed Case\n'];
    for (const sample of samples) {
      expect(normalize(normalize(sample))).toBe(normalize(sample));
    }
  });
});
