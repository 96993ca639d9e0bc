/**
 * Facts extracted from a single source file.
 */
import type { IoKind } from '../config/schema.js';

/**
 * Languages the ingestor understands.
 */
export type SourceLanguage = 'typescript' | 'javascript' | 'python' | 'go';

/**
 * Deny-list family a language reads its patterns from.
 * JavaScript shares the TypeScript lists.
 */
export type DenyFamily = 'typescript' | 'python' | 'go';

export function denyFamilyOf(language: SourceLanguage): DenyFamily {
  return language === 'javascript' ? 'typescript' : language;
}

/**
 * One import/require statement as written in the file.
 */
export interface ImportRef {
  /** Specifier exactly as written (e.g. '../infra/db.js', 'os.path', 'net/http') */
  readonly rawSpecifier: string;
  /** Imported names; 'default' for a default import, '*' for namespace/wildcard */
  readonly symbols: readonly string[];
  /** 1-based line of the statement */
  readonly line: number;
  /** `import type` / `export type` */
  readonly typeOnly: boolean;
  /** `import()` or `require()` */
  readonly dynamic: boolean;
}

export type SymbolKind = 'function' | 'class' | 'interface' | 'type' | 'enum' | 'variable' | 're-export';

/**
 * A public symbol the file exports.
 */
export interface ExportedSymbol {
  readonly name: string;
  readonly kind: SymbolKind;
  readonly line: number;
}

/**
 * Deny-list entry a call site or import matched.
 */
export interface DenyMatch {
  readonly pattern: string;
  readonly kind: IoKind;
}

/**
 * A located construct of interest (deny-listed call, empty handler).
 */
export interface CallSite {
  /** Callee text ('fs.readFileSync', 'Date'); the construct name for handlers ('catch') */
  readonly callee: string;
  readonly line: number;
  readonly column: number;
  readonly endLine: number;
  /** Deny-list entry for I/O call sites */
  readonly matched?: DenyMatch;
}

/**
 * Immutable per-file facts. Created once by the ingestor.
 */
export interface FileFacts {
  /** Root-relative path with forward slashes */
  readonly path: string;
  readonly language: SourceLanguage;
  /** Imports in source order */
  readonly imports: readonly ImportRef[];
  readonly exports: readonly ExportedSymbol[];
  readonly ioCallSites: readonly CallSite[];
  readonly emptyHandlerSites: readonly CallSite[];
  /** Total call expressions seen, deny-listed or not */
  readonly callCount: number;
  readonly parseOk: boolean;
  /** First few parse diagnostics when parseOk is false */
  readonly parseErrors: readonly string[];
}

/**
 * Raw call information produced by a language parser before deny-list matching.
 */
export interface RawCall {
  /** Full callee text with whitespace removed ('api.client.fetch') */
  readonly callee: string;
  /** Receiver for member calls ('api.client' for 'api.client.fetch') */
  readonly receiver?: string;
  readonly line: number;
  readonly column: number;
  readonly endLine: number;
  readonly isConstructorCall: boolean;
}

/**
 * Everything a language parser extracts; the ingestor turns it into FileFacts.
 */
export interface ParsedSource {
  readonly imports: ImportRef[];
  readonly exports: ExportedSymbol[];
  readonly calls: RawCall[];
  readonly emptyHandlers: CallSite[];
  readonly parseErrors: string[];
}
