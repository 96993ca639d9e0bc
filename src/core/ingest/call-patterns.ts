/**
 * Deny-list pattern matching for call sites and external module imports.
 *
 * Call patterns:
 * - Exact: "fetch" matches fetch(), "Date.now" matches Date.now()
 * - Wildcard: "fs.*" matches fs.readFile() but not fs.promises.readFile()
 * - Deep wildcard: "prisma.**" matches prisma.user.findMany()
 * - Regex: "/^debug\./" is tested against the callee text
 *
 * Module patterns are exact specifiers or minimatch globs.
 */
import { minimatch } from 'minimatch';
import type { DenyPattern, IoKind, LanguageDenyList } from '../config/schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { DenyMatch, RawCall } from './types.js';

/**
 * A deny-list entry compiled into a matcher.
 */
export interface CompiledPattern {
  readonly source: string;
  readonly kind: IoKind;
  matches(value: RawCall): boolean;
}

export interface CompiledModulePattern {
  readonly source: string;
  readonly kind: IoKind;
  matches(specifier: string): boolean;
}

/**
 * Compiled deny-list for one language family.
 */
export interface CompiledDenyList {
  readonly calls: readonly CompiledPattern[];
  readonly modules: readonly CompiledModulePattern[];
}

/**
 * Compile a single call pattern. Throws ConfigError for a malformed regex.
 * @param key - Config key reported on failure
 */
export function compileCallPattern(entry: DenyPattern, key: string): CompiledPattern {
  const { pattern, kind } = entry;

  if (pattern.length > 2 && pattern.startsWith('/') && pattern.endsWith('/')) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern.slice(1, -1));
    } catch (error) {
      throw new ConfigError(
        ErrorCodes.INVALID_REGEX,
        `Invalid call pattern '${pattern}' at ${key}: ${error instanceof Error ? error.message : String(error)}`,
        { key, pattern }
      );
    }
    return { source: pattern, kind, matches: (call) => regex.test(call.callee) };
  }

  if (pattern.endsWith('.**')) {
    const prefix = pattern.slice(0, -3);
    return {
      source: pattern,
      kind,
      matches: (call) => call.callee === prefix || call.callee.startsWith(`${prefix}.`),
    };
  }

  if (pattern.endsWith('.*')) {
    const prefix = pattern.slice(0, -2);
    return { source: pattern, kind, matches: (call) => call.receiver === prefix };
  }

  return { source: pattern, kind, matches: (call) => call.callee === pattern };
}

/**
 * Compile a module specifier pattern.
 */
export function compileModulePattern(entry: DenyPattern): CompiledModulePattern {
  const { pattern, kind } = entry;
  return {
    source: pattern,
    kind,
    matches: (specifier) => specifier === pattern || minimatch(specifier, pattern),
  };
}

/**
 * Compile a language deny-list.
 * @param keyPrefix - Config key of the list (e.g. 'io_isolation.deny.typescript')
 */
export function compileDenyList(list: LanguageDenyList, keyPrefix: string): CompiledDenyList {
  return {
    calls: list.calls.map((entry, i) => compileCallPattern(entry, `${keyPrefix}.calls[${i}]`)),
    modules: list.modules.map(compileModulePattern),
  };
}

/**
 * Find the first call pattern that matches a call.
 */
export function findDeniedCall(call: RawCall, patterns: readonly CompiledPattern[]): DenyMatch | null {
  for (const pattern of patterns) {
    if (pattern.matches(call)) {
      return { pattern: pattern.source, kind: pattern.kind };
    }
  }
  return null;
}

/**
 * Find the first module pattern that matches an import specifier.
 */
export function findDeniedModule(
  specifier: string,
  patterns: readonly CompiledModulePattern[]
): DenyMatch | null {
  for (const pattern of patterns) {
    if (pattern.matches(specifier)) {
      return { pattern: pattern.source, kind: pattern.kind };
    }
  }
  return null;
}
