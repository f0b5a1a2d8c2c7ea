/**
 * Pattern set
 *
 * A group of regular expressions queried as one "does any of these match"
 * predicate. Where the patterns allow it they are joined into a single
 * alternation so each line is tested once instead of once per pattern.
 */

import type { PatternFailure, Result } from '@linesift/shared';
import { ok, err } from '@linesift/shared';

/**
 * How the set evaluates a line
 *
 * - combined: one alternation of every pattern
 * - scan: each pattern in declaration order, stopping at the first hit
 */
export type MatchStrategy = 'combined' | 'scan';

/** Leading inline flag group, e.g. `(?i)` or `(?ms)` */
const INLINE_FLAGS = /^\(\?([ims]+)\)/;

/** Constructs whose meaning changes when patterns share one expression */
const GROUP_SENSITIVE = /\\[1-9]|\\k<|\(\?<(?![=!])/;

interface ParsedPattern {
  source: string;
  flags: string;
}

/**
 * Split a leading inline flag group off a pattern
 *
 * Every pattern is compiled in Unicode mode; `(?i)`, `(?m)` and `(?s)` map to
 * the matching RegExp flags.
 */
export function parsePattern(pattern: string): ParsedPattern {
  const match = INLINE_FLAGS.exec(pattern);
  const flags = new Set(['u']);
  if (!match) {
    return { source: pattern, flags: 'u' };
  }
  for (const flag of match[1] ?? '') {
    flags.add(flag);
  }
  return {
    source: pattern.slice(match[0].length),
    flags: Array.from(flags).sort().join(''),
  };
}

function describeCompileError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function canCombine(parsed: ParsedPattern[]): boolean {
  if (parsed.length < 2) {
    return false;
  }
  const flags = parsed[0]?.flags;
  return parsed.every(p => p.flags === flags && !GROUP_SENSITIVE.test(p.source));
}

function combine(parsed: ParsedPattern[]): RegExp | null {
  const source = parsed.map(p => `(?:${p.source})`).join('|');
  try {
    return new RegExp(source, parsed[0]?.flags);
  } catch {
    // Falls back to scanning the individually compiled patterns
    return null;
  }
}

export class PatternSet {
  private constructor(
    /** Pattern sources as declared */
    readonly patterns: readonly string[],
    private readonly expressions: readonly RegExp[],
    readonly strategy: MatchStrategy,
  ) {}

  /**
   * Compile a list of patterns
   *
   * Every pattern is compiled; all failures are returned together.
   */
  static compile(patterns: readonly string[]): Result<PatternSet, PatternFailure[]> {
    const failures: PatternFailure[] = [];
    const parsed: ParsedPattern[] = [];
    const compiled: RegExp[] = [];

    patterns.forEach((pattern, index) => {
      const candidate = parsePattern(pattern);
      try {
        compiled.push(new RegExp(candidate.source, candidate.flags));
        parsed.push(candidate);
      } catch (error) {
        failures.push({ index, pattern, reason: describeCompileError(error) });
      }
    });

    if (failures.length > 0) {
      return err(failures);
    }

    const joined = canCombine(parsed) ? combine(parsed) : null;
    if (joined) {
      return ok(new PatternSet([...patterns], [joined], 'combined'));
    }
    return ok(new PatternSet([...patterns], compiled, 'scan'));
  }

  /**
   * Whether at least one pattern matches somewhere in the line
   */
  matches(line: string): boolean {
    for (const expression of this.expressions) {
      if (expression.test(line)) {
        return true;
      }
    }
    return false;
  }
}
