/**
 * Language parser interface definition.
 */
import type { ParsedSource, SourceLanguage } from '../core/ingest/types.js';

/**
 * Turns the text of one source file into raw facts.
 * Parsers never throw on malformed input; problems are reported in `parseErrors`.
 */
export interface ILanguageParser {
  /** Languages this parser supports */
  readonly supportedLanguages: SourceLanguage[];

  /** File extensions this parser handles, with the leading dot */
  readonly supportedExtensions: string[];

  /**
   * Parse source text.
   * @param filePath Root-relative path, used for diagnostics and script kind
   */
  parse(filePath: string, content: string): ParsedSource;

  /**
   * Release resources.
   */
  dispose(): void;
}
