import { describe, expect, it } from 'vitest';
import { domainGroup, domainReliability, evidenceWeight } from '../../../../src/services/sources/reliability';

describe('domainReliability', () => {
  it('scores listed domains', () => {
    expect(domainReliability('https://www.who.int/news')).toBe(0.95);
    expect(domainReliability('https://www.altnews.in/x')).toBe(0.9);
  });

  it('lets subdomains inherit the parent score', () => {
    expect(domainReliability('https://news.bbc.co.uk/story')).toBe(0.88);
  });

  it('prefers the most specific listed domain', () => {
    expect(domainReliability('https://ecdc.europa.eu/en')).toBe(0.93);
  });

  it('falls back to institutional suffixes', () => {
    expect(domainReliability('https://dept.gov.in/notice')).toBe(0.93);
    expect(domainReliability('https://health.state.gov/x')).toBe(0.9);
  });

  it('knows nothing about other domains', () => {
    expect(domainReliability('https://randomblog.example/post')).toBeNull();
  });
});

describe('evidenceWeight', () => {
  it('never lowers the adapter weight', () => {
    expect(evidenceWeight(0.6, 'https://www.who.int/x')).toBe(0.95);
    expect(evidenceWeight(0.9, 'https://www.reuters.com/x')).toBe(0.9);
    expect(evidenceWeight(0.6, 'https://randomblog.example/post')).toBe(0.6);
  });
});

describe('domainGroup', () => {
  it.each([
    ['https://www.who.int/news', 'official'],
    ['https://ndma.gov.in/alerts', 'official'],
    ['https://district.nic.in/flood', 'official'],
    ['https://factcheck.afp.com/lemon', 'factCheck'],
    ['https://www.afp.com/en/news', 'news'],
    ['https://cs.stanford.edu/paper', 'academic'],
  ])('puts %s in %s', (url, group) => {
    expect(domainGroup(url)).toBe(group);
  });

  it('has no group for unknown domains', () => {
    expect(domainGroup('https://randomblog.example/post')).toBeNull();
  });
});
