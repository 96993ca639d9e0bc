/**
 * Registry mapping file extensions to language parsers.
 */
import * as path from 'node:path';
import type { SourceLanguage } from '../core/ingest/types.js';
import type { ILanguageParser } from './interface.types.js';

export type { ILanguageParser } from './interface.types.js';

/**
 * Factory function for creating parsers.
 * Used for lazy instantiation.
 */
export type ParserFactory = () => ILanguageParser;

interface ParserRegistration {
  factory: ParserFactory;
  extensions: Map<string, SourceLanguage>;
  instance?: ILanguageParser;
}

/**
 * Registry for language parsers. One instance per analysis run.
 */
export class ParserRegistry {
  private registrations = new Map<string, ParserRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register a language parser.
   *
   * @param id Unique identifier for the parser (e.g., 'typescript', 'python')
   * @param factory Factory function to create the parser
   * @param extensions Extension → language the parser reports for it
   */
  register(id: string, factory: ParserFactory, extensions: Record<string, SourceLanguage>): void {
    const extensionLanguages = new Map<string, SourceLanguage>();
    for (const [ext, language] of Object.entries(extensions)) {
      extensionLanguages.set(ext.toLowerCase(), language);
      this.extensionMap.set(ext.toLowerCase(), id);
    }
    this.registrations.set(id, { factory, extensions: extensionLanguages });
  }

  /**
   * Parser and language for a file path, or null when the extension is unsupported.
   */
  resolve(filePath: string): { parser: ILanguageParser; language: SourceLanguage } | null {
    const ext = path.extname(filePath).toLowerCase();
    const id = this.extensionMap.get(ext);
    if (!id) return null;

    const registration = this.registrations.get(id);
    const language = registration?.extensions.get(ext);
    if (!registration || !language) return null;

    // Lazy instantiation
    if (!registration.instance) {
      registration.instance = registration.factory();
    }
    return { parser: registration.instance, language };
  }

  /**
   * Check if a file extension is supported.
   */
  isSupported(filePath: string): boolean {
    return this.extensionMap.has(path.extname(filePath).toLowerCase());
  }

  /**
   * Get all supported extensions.
   */
  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Dispose all parser instances.
   */
  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }
}
