/**
 * SourceIngestor: one file in, one immutable FileFacts out.
 */
import * as path from 'node:path';
import type { ILanguageParser, ParserRegistry } from '../../parsers/parser-registry.js';
import { readFileBytes } from '../../utils/file-system.js';
import { ErrorCodes, InvariantError } from '../../utils/errors.js';
import { findDeniedCall, type CompiledDenyList } from './call-patterns.js';
import {
  denyFamilyOf,
  type CallSite,
  type DenyFamily,
  type FileFacts,
  type ParsedSource,
  type SourceLanguage,
} from './types.js';

export class SourceIngestor {
  constructor(
    private readonly parsers: ParserRegistry,
    private readonly denyLists: Readonly<Record<DenyFamily, CompiledDenyList>>
  ) {}

  /**
   * Read and ingest a file. A failed read becomes a parse failure, never an exception.
   * @param root - Absolute analysis root
   * @param relativePath - Root-relative path with forward slashes
   */
  async ingestFile(root: string, relativePath: string): Promise<FileFacts> {
    let bytes: Buffer;
    try {
      bytes = await readFileBytes(path.join(root, relativePath));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.failed(relativePath, this.resolveParser(relativePath).language, [`read failed: ${reason}`]);
    }
    return this.ingest(relativePath, bytes);
  }

  /**
   * Pure transform of bytes to facts.
   */
  ingest(relativePath: string, bytes: Uint8Array): FileFacts {
    const { parser, language } = this.resolveParser(relativePath);

    if (bytes.includes(0)) {
      return this.failed(relativePath, language, ['binary content (NUL byte)']);
    }

    const content = Buffer.from(bytes).toString('utf-8').replace(/^\uFEFF/, '');
    let parsed: ParsedSource;
    try {
      parsed = parser.parse(relativePath, content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.failed(relativePath, language, [`parser crashed: ${reason}`]);
    }

    const denyList = this.denyLists[denyFamilyOf(language)];
    const ioCallSites: CallSite[] = [];
    for (const call of parsed.calls) {
      const matched = findDeniedCall(call, denyList.calls);
      if (matched) {
        ioCallSites.push({
          callee: call.callee,
          line: call.line,
          column: call.column,
          endLine: call.endLine,
          matched,
        });
      }
    }

    return Object.freeze({
      path: relativePath,
      language,
      imports: parsed.imports,
      exports: parsed.exports,
      ioCallSites,
      emptyHandlerSites: parsed.emptyHandlers,
      callCount: parsed.calls.length,
      parseOk: parsed.parseErrors.length === 0,
      parseErrors: parsed.parseErrors,
    });
  }

  private resolveParser(relativePath: string): { parser: ILanguageParser; language: SourceLanguage } {
    const resolved = this.parsers.resolve(relativePath);
    if (!resolved) {
      throw new InvariantError(
        ErrorCodes.UNEXPECTED,
        `File without a registered parser reached ingestion: ${relativePath}`,
        { path: relativePath }
      );
    }
    return resolved;
  }

  private failed(relativePath: string, language: SourceLanguage, parseErrors: string[]): FileFacts {
    return Object.freeze({
      path: relativePath,
      language,
      imports: [],
      exports: [],
      ioCallSites: [],
      emptyHandlerSites: [],
      callCount: 0,
      parseOk: false,
      parseErrors,
    });
  }
}
