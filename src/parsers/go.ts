/**
 * Go parser using regex-based line scanning.
 */
import type { ILanguageParser } from './interface.types.js';
import type {
  CallSite,
  ExportedSymbol,
  ImportRef,
  ParsedSource,
  RawCall,
  SourceLanguage,
  SymbolKind,
} from '../core/ingest/types.js';
import { checkBalance, GO_SYNTAX, LineIndex, maskSource } from './lexical.js';

const CALL_KEYWORDS = new Set([
  'if', 'for', 'switch', 'select', 'case', 'range', 'return',
  'func', 'type', 'var', 'const', 'import', 'package', 'map',
  'chan', 'struct', 'interface', 'go', 'defer',
]);

/**
 * Go parser using regex-based line-by-line scanning over masked source.
 *
 * Known limitations:
 * - Function signatures must start on the `func` line.
 * - Calls through index or call results (`a[0].B()`, `f().G()`) are not recorded.
 */
export class GoParser implements ILanguageParser {
  readonly supportedLanguages: SourceLanguage[] = ['go'];
  readonly supportedExtensions = ['.go'];

  parse(_filePath: string, content: string): ParsedSource {
    const { masked, errors } = maskSource(content, GO_SYNTAX);
    const lines = content.split('\n');
    const code = masked.split('\n');

    return {
      imports: this.extractImports(lines, code),
      exports: this.extractExports(code),
      calls: this.extractCalls(code),
      emptyHandlers: this.extractEmptyHandlers(masked),
      parseErrors: [...errors, ...checkBalance(masked)].slice(0, 5),
    };
  }

  /**
   * Import paths are read from the original lines (strings are masked);
   * masked lines decide which lines are code.
   */
  private extractImports(lines: string[], code: string[]): ImportRef[] {
    const imports: ImportRef[] = [];

    const toImport = (text: string, line: number): ImportRef | null => {
      // \w+ matches named aliases and _ (blank import); \. matches dot imports
      const match = text.match(/^(?:(\w+|\.)\s+)?"([^"]+)"/);
      if (!match?.[2]) return null;
      const alias = match[1];
      const pkg = match[2];
      const symbols = alias === '.' ? ['*'] : alias === '_' ? [] : [alias ?? pkg.split('/').pop() ?? pkg];
      return { rawSpecifier: pkg, symbols, line, typeOnly: false, dynamic: false };
    };

    for (let i = 0; i < code.length; i++) {
      const codeLine = (code[i] ?? '').trim();
      if (!codeLine.startsWith('import')) continue;

      // Grouped import: import ( ... )
      if (/^import\s*\(/.test(codeLine)) {
        const rest = (lines[i] ?? '').trim().replace(/^import\s*\(/, '').trim();
        const first = rest ? toImport(rest, i + 1) : null;
        if (first) imports.push(first);

        let j = i + 1;
        while (j < code.length && !(code[j] ?? '').trim().startsWith(')')) {
          const entry = toImport((lines[j] ?? '').trim(), j + 1);
          if (entry && (code[j] ?? '').trim() !== '') imports.push(entry);
          j++;
        }
        i = j;
        continue;
      }

      // Single import: import "fmt" or import f "fmt"
      const single = toImport((lines[i] ?? '').trim().replace(/^import\s+/, ''), i + 1);
      if (single) imports.push(single);
    }

    return imports;
  }

  /**
   * Capitalized top-level declarations, including grouped `var (...)`,
   * `const (...)` and `type (...)` blocks and methods.
   */
  private extractExports(code: string[]): ExportedSymbol[] {
    const exports: ExportedSymbol[] = [];
    const push = (name: string | undefined, kind: SymbolKind, line: number): void => {
      if (name && /^[A-Z]/.test(name)) exports.push({ name, kind, line });
    };

    for (let i = 0; i < code.length; i++) {
      const text = code[i] ?? '';
      const line = i + 1;

      const funcMatch = text.match(/^func\s+(?:\([^)]*\)\s*)?(\w+)/);
      if (funcMatch) {
        push(funcMatch[1], 'function', line);
        continue;
      }

      const typeMatch = text.match(/^type\s+(\w+)(?:\[[^\]]*\])?\s+(\w+)?/);
      if (typeMatch) {
        push(typeMatch[1], typeMatch[2] === 'interface' ? 'interface' : 'type', line);
        continue;
      }

      const valueMatch = text.match(/^(?:var|const)\s+(\w+)/);
      if (valueMatch) {
        push(valueMatch[1], 'variable', line);
        continue;
      }

      const groupMatch = text.match(/^(var|const|type)\s*\(/);
      if (groupMatch) {
        let j = i + 1;
        while (j < code.length && !(code[j] ?? '').trim().startsWith(')')) {
          const entry = (code[j] ?? '').match(/^\s+(\w+)(?:\s+(\w+))?/);
          if (entry) {
            const kind: SymbolKind = groupMatch[1] === 'type'
              ? (entry[2] === 'interface' ? 'interface' : 'type')
              : 'variable';
            push(entry[1], kind, j + 1);
          }
          j++;
        }
        i = j;
      }
    }

    return exports;
  }

  private extractCalls(code: string[]): RawCall[] {
    const calls: RawCall[] = [];
    const callPattern = /(?:([A-Za-z_][\w.]*?)\.)?([A-Za-z_]\w*)\s*\(/g;

    for (let i = 0; i < code.length; i++) {
      const text = code[i] ?? '';
      const trimmed = text.trim();
      if (trimmed.startsWith('import') || trimmed.startsWith('package ')) continue;

      callPattern.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = callPattern.exec(text)) !== null) {
        const receiver = match[1];
        const name = match[2] ?? '';
        if (!receiver && CALL_KEYWORDS.has(name)) continue;

        const before = text.slice(0, match.index);
        // Part of a longer expression, or a func declaration name
        if (/[\w.]$/.test(before)) continue;
        if (/\bfunc\s+(?:\([^)]*\)\s*)?$/.test(before)) continue;

        calls.push({
          callee: receiver ? `${receiver}.${name}` : name,
          receiver,
          line: i + 1,
          column: match.index + 1,
          endLine: i + 1,
          isConstructorCall: false,
        });
      }
    }

    return calls;
  }

  /**
   * `if err != nil {}` and `if err := f(); err != nil {}` with an empty block.
   */
  private extractEmptyHandlers(masked: string): CallSite[] {
    const handlers: CallSite[] = [];
    const index = new LineIndex(masked);
    const pattern = /\bif\s+(?:[^{\n;]*;\s*)?err\s*!=\s*nil\s*\{\s*\}/g;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(masked)) !== null) {
      const start = index.locate(match.index);
      const end = index.locate(match.index + match[0].length - 1);
      handlers.push({ callee: 'if err != nil', line: start.line, column: start.column, endLine: end.line });
    }

    return handlers;
  }

  dispose(): void {
    // No resources to clean up for regex-based parsing
  }
}
