import { describe, it, expect } from 'vitest';
import {
  extractHttpsUrls,
  findNctId,
  lastHttpsToken,
  normalizeCtgovUrl,
  preprintToDoi,
  purifyLink,
  purifyUrl,
} from './urls';

describe('lastHttpsToken', () => {
  it('returns the last https token and ignores markdown brackets', () => {
    expect(lastHttpsToken('see [site](https://a.org/x) and https://b.org/y')).toBe('https://b.org/y');
  });

  it('returns null for non-strings or text without https', () => {
    expect(lastHttpsToken(42)).toBeNull();
    expect(lastHttpsToken('http://plain.org')).toBeNull();
  });

  it('extracts every token in order', () => {
    expect(extractHttpsUrls('"https://a.org" then https://b.org/c')).toEqual([
      'https://a.org',
      'https://b.org/c',
    ]);
  });
});

describe('purifyUrl', () => {
  it('unwraps markdown and strips tracking query and fragment', () => {
    expect(purifyUrl('[Lab](https://lab.example.org/team?utm_source=gpt#top)')).toBe(
      'https://lab.example.org/team',
    );
  });

  it('strips text fragments', () => {
    expect(purifyUrl('https://a.org/p#:~:text=hello')).toBe('https://a.org/p');
  });

  it('keeps ordinary query strings', () => {
    expect(purifyUrl('https://a.org/p?id=3')).toBe('https://a.org/p?id=3');
  });

  it('rewrites legacy ClinicalTrials.gov paths', () => {
    expect(purifyUrl('https://clinicaltrials.gov/ct2/show/NCT01234567')).toBe(
      'https://clinicaltrials.gov/study/NCT01234567',
    );
  });

  it('returns null when nothing https is present', () => {
    expect(purifyUrl('http://insecure.org')).toBeNull();
    expect(purifyUrl(undefined)).toBeNull();
  });
});

describe('purifyLink', () => {
  it('upgrades http, drops tracking keys and the fragment', () => {
    expect(purifyLink('http://example.org/page?utm_source=x&id=7&ref=home#section)')).toBe(
      'https://example.org/page?id=7',
    );
  });

  it('matches tracking prefixes case-insensitively', () => {
    expect(purifyLink('https://example.org/?Referrer=z&q=1')).toBe('https://example.org/?q=1');
  });

  it('trims trailing markdown closers', () => {
    expect(purifyLink('https://example.org/a)]')).toBe('https://example.org/a');
  });

  it('leaves non-https schemes alone', () => {
    expect(purifyLink('mailto:someone@example.org')).toBe('mailto:someone@example.org');
  });
});

describe('normalizeCtgovUrl', () => {
  it('rewrites exact show URLs only', () => {
    expect(normalizeCtgovUrl('https://ClinicalTrials.gov/ct2/show/NCT01234567')).toBe(
      'https://clinicaltrials.gov/study/NCT01234567',
    );
    expect(normalizeCtgovUrl('https://clinicaltrials.gov/ct2/show/NCT01234567?term=x')).toBe(
      'https://clinicaltrials.gov/ct2/show/NCT01234567?term=x',
    );
  });
});

describe('preprintToDoi', () => {
  it('maps medRxiv full-text PDFs to the DOI without version', () => {
    expect(
      preprintToDoi('https://www.medrxiv.org/content/10.1101/2021.03.04.21252894v2.full.pdf'),
    ).toBe('https://doi.org/10.1101/2021.03.04.21252894');
  });

  it('maps bioRxiv /full.pdf paths', () => {
    expect(preprintToDoi('https://www.biorxiv.org/content/10.1101/2020.01.01.123456v1/full.pdf')).toBe(
      'https://doi.org/10.1101/2020.01.01.123456',
    );
  });

  it('leaves other URLs unchanged', () => {
    expect(preprintToDoi('https://journal.example.org/article/1')).toBe(
      'https://journal.example.org/article/1',
    );
  });
});

describe('findNctId', () => {
  it('finds the first registry id', () => {
    expect(findNctId('see https://x.org/NCT12345678?x and NCT87654321')).toBe('NCT12345678');
    expect(findNctId('none here')).toBeNull();
  });
});
