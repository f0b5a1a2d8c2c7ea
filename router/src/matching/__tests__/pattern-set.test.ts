/**
 * Pattern Set Tests
 */

import { describe, it, expect } from 'vitest';
import { PatternSet, parsePattern } from '../pattern-set.js';

function compile(patterns: string[]): PatternSet {
  const result = PatternSet.compile(patterns);
  if (!result.ok) {
    throw new Error(`expected patterns to compile: ${patterns.join(', ')}`);
  }
  return result.value;
}

describe('PatternSet', () => {
  describe('compile', () => {
    it('should compile a single pattern', () => {
      const set = compile(['^[0-9]+$']);

      expect(set.patterns).toEqual(['^[0-9]+$']);
      expect(set.strategy).toBe('scan');
    });

    it('should join compatible patterns into one expression', () => {
      const set = compile(['\\.azurewebsites\\.net', '\\.trafficmanager\\.net']);

      expect(set.strategy).toBe('combined');
    });

    it('should report every pattern that fails to compile', () => {
      const result = PatternSet.compile(['(', 'fine', '[z-a]']);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.map(f => f.index)).toEqual([0, 2]);
        expect(result.error.map(f => f.pattern)).toEqual(['(', '[z-a]']);
        expect(result.error[0]?.reason).toContain('Invalid regular expression');
      }
    });

    it('should scan patterns with differing flags', () => {
      expect(compile(['(?i)error', 'warn']).strategy).toBe('scan');
    });

    it('should scan patterns that use backreferences', () => {
      expect(compile(['(x)', '(y)\\1']).strategy).toBe('scan');
    });

    it('should scan patterns that use named groups', () => {
      expect(compile(['(?<word>a)', 'b']).strategy).toBe('scan');
    });
  });

  describe('matches', () => {
    it('should match when any pattern matches', () => {
      const set = compile(['foo', 'bar']);

      expect(set.matches('xbarx')).toBe(true);
      expect(set.matches('foo')).toBe(true);
      expect(set.matches('baz')).toBe(false);
    });

    it('should match anywhere in the line unless anchored', () => {
      const set = compile(['^[0-9]+$']);

      expect(set.matches('123')).toBe(true);
      expect(set.matches('abc')).toBe(false);
      expect(set.matches('12a')).toBe(false);
    });

    it('should keep backreferences local to their own pattern', () => {
      const set = compile(['(x)', '(y)\\1']);

      expect(set.matches('yy')).toBe(true);
      expect(set.matches('yx')).toBe(true);
      expect(set.matches('yz')).toBe(false);
    });

    it('should match empty lines', () => {
      const set = compile(['^$']);

      expect(set.matches('')).toBe(true);
      expect(set.matches(' ')).toBe(false);
    });

    it('should match by code point', () => {
      const set = compile(['^.$']);

      expect(set.matches('😎')).toBe(true);
    });

    it('should apply inline flags', () => {
      const set = compile(['(?i)^error']);

      expect(set.matches('ERROR: disk full')).toBe(true);
      expect(set.matches('no error here')).toBe(false);
    });

    it('should give the same answer on repeated calls', () => {
      const set = compile(['a', 'b']);

      expect([set.matches('a'), set.matches('a'), set.matches('a')]).toEqual([true, true, true]);
    });

    it('should not apply case folding of its own', () => {
      const set = compile(['cname']);

      expect(set.matches('"CNAME"')).toBe(false);
    });
  });
});

describe('parsePattern', () => {
  it('should compile in unicode mode by default', () => {
    expect(parsePattern('abc')).toEqual({ source: 'abc', flags: 'u' });
  });

  it('should lift a leading flag group into flags', () => {
    expect(parsePattern('(?i)abc')).toEqual({ source: 'abc', flags: 'iu' });
    expect(parsePattern('(?sm)a.b')).toEqual({ source: 'a.b', flags: 'msu' });
  });

  it('should leave other groups alone', () => {
    expect(parsePattern('(?:ab)+')).toEqual({ source: '(?:ab)+', flags: 'u' });
  });
});
