/**
 * Resolves import specifiers onto the analyzed file set.
 *
 * Order: relative specifiers, then configured aliases (longest prefix first),
 * then resolution roots. Anything left over is external.
 */
import * as path from 'node:path';
import type { ResolvePolicy } from '../config/policy.js';
import type { ImportRef, SourceLanguage } from '../ingest/types.js';
import type { ResolvedImport } from './types.js';

const posix = path.posix;

const TS_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

// ESM-style specifiers name the emitted file; the source has a TS extension
const EXTENSION_SWAPS: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

/**
 * A Go module declared by a go.mod file.
 */
export interface GoModule {
  /** Module path from the `module` directive */
  readonly modulePath: string;
  /** Root-relative directory holding go.mod ('.' for the root) */
  readonly dir: string;
}

interface Lookup {
  readonly exact: boolean;
  readonly found: string[];
}

const NOT_FOUND: Lookup = { exact: false, found: [] };

export class ImportResolver {
  private readonly files: ReadonlySet<string>;
  private readonly goPackages = new Map<string, string[]>();
  private readonly goModules: readonly GoModule[];

  constructor(
    paths: readonly string[],
    private readonly policy: ResolvePolicy,
    goModules: readonly GoModule[] = []
  ) {
    this.files = new Set(paths);
    for (const file of [...paths].sort()) {
      if (!file.endsWith('.go') || file.endsWith('_test.go')) continue;
      const dir = posix.dirname(file);
      const members = this.goPackages.get(dir) ?? [];
      members.push(file);
      this.goPackages.set(dir, members);
    }
    // Longest module path first so nested modules win
    this.goModules = [...goModules].sort((a, b) => b.modulePath.length - a.modulePath.length);
  }

  resolve(fromPath: string, language: SourceLanguage, ref: ImportRef): ResolvedImport {
    const lookup = this.lookup(fromPath, language, ref);
    const found = lookup.found;

    if (found.length === 0) {
      return { ...ref, resolvedPath: null, targets: [], resolution: 'external', candidates: [] };
    }
    if (!lookup.exact && found.length > 1) {
      return { ...ref, resolvedPath: null, targets: [], resolution: 'ambiguous', candidates: found };
    }

    const targets = language === 'go' || language === 'python' ? found : found.slice(0, 1);
    return { ...ref, resolvedPath: targets[0] ?? null, targets, resolution: 'internal', candidates: [] };
  }

  private lookup(fromPath: string, language: SourceLanguage, ref: ImportRef): Lookup {
    const spec = ref.rawSpecifier;
    const fromDir = posix.dirname(fromPath);

    switch (language) {
      case 'typescript':
      case 'javascript':
        return this.lookupScript(spec, fromDir);
      case 'python':
        return this.lookupPython(spec, fromDir, ref.symbols);
      case 'go':
        return this.lookupGo(spec, fromDir);
    }
  }

  private lookupScript(spec: string, fromDir: string): Lookup {
    if (isRelative(spec)) {
      const base = joinInsideRoot(fromDir, spec);
      return base === null ? NOT_FOUND : this.scriptCandidates(base);
    }
    for (const base of this.nonRelativeBases(spec)) {
      const result = this.scriptCandidates(base);
      if (result.found.length > 0) return result;
    }
    return NOT_FOUND;
  }

  /**
   * Exact file, extension swaps, appended extensions, then `index.*`.
   */
  private scriptCandidates(base: string): Lookup {
    if (this.files.has(base) && TS_EXTENSIONS.includes(posix.extname(base))) {
      return { exact: true, found: [base] };
    }

    const candidates: string[] = [];
    const ext = posix.extname(base);
    for (const swap of EXTENSION_SWAPS[ext] ?? []) {
      candidates.push(base.slice(0, -ext.length) + swap);
    }
    for (const extension of TS_EXTENSIONS) candidates.push(base + extension);
    for (const extension of TS_EXTENSIONS) candidates.push(posix.join(base, `index${extension}`));

    return { exact: false, found: unique(candidates.filter((c) => this.files.has(c))) };
  }

  private lookupPython(spec: string, fromDir: string, symbols: readonly string[]): Lookup {
    const dots = spec.match(/^\.*/)?.[0].length ?? 0;

    if (dots > 0) {
      let dir: string | null = fromDir;
      for (let i = 1; i < dots && dir !== null; i++) {
        dir = dir === '.' ? null : posix.dirname(dir);
      }
      if (dir === null) return NOT_FOUND;
      const rest = spec.slice(dots).replace(/\./g, '/');
      return this.pythonCandidates(rest ? posix.join(dir, rest) : dir, symbols);
    }

    for (const base of this.nonRelativeBases(spec, (rest) => rest.replace(/\./g, '/'))) {
      const result = this.pythonCandidates(base, symbols);
      if (result.found.length > 0) return result;
    }
    return NOT_FOUND;
  }

  /**
   * `a/b.py` or `a/b/__init__.py`, plus `a/b/<symbol>.py` submodules named
   * by `from a.b import symbol`.
   */
  private pythonCandidates(base: string, symbols: readonly string[]): Lookup {
    const primary = [`${base}.py`, posix.join(base, '__init__.py')].filter((c) => this.files.has(c));

    const submodules: string[] = [];
    for (const symbol of symbols) {
      if (symbol === '*') continue;
      for (const candidate of [posix.join(base, `${symbol}.py`), posix.join(base, symbol, '__init__.py')]) {
        if (this.files.has(candidate)) submodules.push(candidate);
      }
    }

    if (primary.length > 1) return { exact: false, found: primary };
    return { exact: true, found: unique([...primary, ...submodules]) };
  }

  private lookupGo(spec: string, fromDir: string): Lookup {
    if (isRelative(spec)) {
      const dir = joinInsideRoot(fromDir, spec);
      return { exact: true, found: dir === null ? [] : this.goPackages.get(dir) ?? [] };
    }

    for (const module of this.goModules) {
      if (spec === module.modulePath || spec.startsWith(`${module.modulePath}/`)) {
        const dir = posix.normalize(posix.join(module.dir, spec.slice(module.modulePath.length)));
        const found = this.goPackages.get(stripTrailingSlash(dir)) ?? [];
        if (found.length > 0) return { exact: true, found };
      }
    }

    for (const base of this.nonRelativeBases(spec)) {
      const found = this.goPackages.get(stripTrailingSlash(base)) ?? [];
      if (found.length > 0) return { exact: true, found };
    }
    return NOT_FOUND;
  }

  /**
   * Candidate base paths for a non-relative specifier: the matching alias
   * first, then every resolution root.
   * @param toPath - Converts the specifier remainder to a relative path
   */
  private nonRelativeBases(spec: string, toPath: (rest: string) => string = (rest) => rest): string[] {
    const bases: string[] = [];

    const alias = this.policy.aliases.find((a) => spec.startsWith(a.prefix));
    if (alias) {
      const base = joinInsideRoot(alias.target, toPath(spec.slice(alias.prefix.length)));
      if (base !== null) bases.push(base);
    }

    for (const root of this.policy.roots) {
      const base = joinInsideRoot(root, toPath(spec));
      if (base !== null) bases.push(base);
    }

    return unique(bases);
  }
}

function isRelative(spec: string): boolean {
  return spec === '.' || spec === '..' || spec.startsWith('./') || spec.startsWith('../');
}

/**
 * Join and normalize, or null when the result escapes the root.
 */
function joinInsideRoot(dir: string, rest: string): string | null {
  const joined = posix.normalize(posix.join(dir, rest));
  if (joined === '..' || joined.startsWith('../') || posix.isAbsolute(joined)) return null;
  return stripTrailingSlash(joined);
}

function stripTrailingSlash(p: string): string {
  return p.length > 1 ? p.replace(/\/+$/, '') : p;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

