import type { NamingPolicy, SourceName } from '../types.js';
import { extractLogicalName } from '../utils/sourceName.js';

export type CompiledMatcher = {
  readonly policy: Readonly<NamingPolicy>;
  readonly effectivePattern: string;
  readonly regex: RegExp;
};

export class PatternCompileError extends Error {
  readonly pattern: string;
  readonly effectivePattern: string;

  constructor(pattern: string, effectivePattern: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid naming pattern "${pattern}": ${detail}`, { cause });
    this.name = 'PatternCompileError';
    this.pattern = pattern;
    this.effectivePattern = effectivePattern;
  }
}

const SIMPLE_TOKEN = /^[A-Za-z0-9_.*]+$/;
const ENDS_WITH_WORD_CHAR = /[A-Za-z0-9_]$/;

export function transformPatternForPlurals(pattern: string, enabled: boolean): string {
  if (!enabled) {
    return pattern;
  }
  if (!SIMPLE_TOKEN.test(pattern) || !ENDS_WITH_WORD_CHAR.test(pattern)) {
    return pattern;
  }
  if (pattern.endsWith('s?')) {
    return pattern;
  }
  return `${pattern}s?`;
}

export function compileNamingPolicy(policy: NamingPolicy): CompiledMatcher {
  const effectivePattern = transformPatternForPlurals(policy.pattern, policy.pluralRelaxation);
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${effectivePattern})$`, policy.caseSensitive ? '' : 'i');
  } catch (error) {
    throw new PatternCompileError(policy.pattern, effectivePattern, error);
  }
  return Object.freeze({
    policy: Object.freeze({ ...policy }),
    effectivePattern,
    regex
  });
}

export function matches(compiled: CompiledMatcher, sourceName: SourceName): boolean {
  return compiled.regex.test(extractLogicalName(sourceName));
}

export function filterMatching(
  compiled: CompiledMatcher,
  names: readonly SourceName[]
): SourceName[] {
  return names.filter(name => matches(compiled, name));
}
