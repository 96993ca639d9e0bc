/**
 * Python parser using regex-based line scanning.
 */
import type { ILanguageParser } from './interface.types.js';
import type {
  CallSite,
  ExportedSymbol,
  ImportRef,
  ParsedSource,
  RawCall,
  SourceLanguage,
} from '../core/ingest/types.js';
import { checkBalance, maskSource, PYTHON_SYNTAX } from './lexical.js';

// Keywords that look like calls: `if (x)`, `return (a, b)`
const CALL_KEYWORDS = new Set([
  'if', 'elif', 'while', 'for', 'with', 'assert', 'except', 'return', 'yield',
  'del', 'not', 'and', 'or', 'in', 'is', 'lambda', 'raise',
  'import', 'from', 'class', 'def', 'async', 'await', 'else', 'try', 'finally',
]);

/**
 * Python parser using regex-based line-by-line scanning over masked source.
 *
 * Known limitations:
 * - Imports and definitions must start their own line.
 * - Calls through subscripts or call results (`a[0].b()`, `f().g()`) are
 *   not recorded.
 */
export class PythonParser implements ILanguageParser {
  readonly supportedLanguages: SourceLanguage[] = ['python'];
  readonly supportedExtensions = ['.py'];

  parse(_filePath: string, content: string): ParsedSource {
    const { masked, errors } = maskSource(content, PYTHON_SYNTAX);
    const lines = content.split('\n');
    const code = masked.split('\n');

    return {
      imports: this.extractImports(code),
      exports: this.extractExports(lines, code),
      calls: this.extractCalls(code),
      emptyHandlers: this.extractEmptyHandlers(code),
      parseErrors: [...errors, ...checkBalance(masked)].slice(0, 5),
    };
  }

  private extractImports(code: string[]): ImportRef[] {
    const imports: ImportRef[] = [];

    for (let i = 0; i < code.length; i++) {
      const trimmed = (code[i] ?? '').trim();
      const line = i + 1;

      // import a.b, c as d
      const importMatch = trimmed.match(/^import\s+(.+)$/);
      if (importMatch?.[1]) {
        for (const part of importMatch[1].split(',')) {
          const moduleName = part.trim().split(/\s+as\s+/)[0]?.trim();
          if (moduleName && /^[\w.]+$/.test(moduleName)) {
            imports.push({ rawSpecifier: moduleName, symbols: ['*'], line, typeOnly: false, dynamic: false });
          }
        }
        continue;
      }

      // from .relative import name
      // from module import (name1,
      //                     name2)
      const fromMatch = trimmed.match(/^from\s+(\.*[\w.]*)\s+import\s+(.+)$/);
      if (fromMatch?.[1] && fromMatch[2]) {
        let names = fromMatch[2].trim();
        if (names.startsWith('(') && !names.includes(')')) {
          let j = i + 1;
          while (j < code.length && !(code[j] ?? '').includes(')')) {
            names += ' ' + (code[j] ?? '').trim();
            j++;
          }
          if (j < code.length) names += ' ' + (code[j] ?? '').trim();
        }
        names = names.replace(/[()\\]/g, '').trim();

        const symbols = names === '*'
          ? ['*']
          : names.split(',')
            .map((n) => n.trim().split(/\s+as\s+/)[0]?.trim() ?? '')
            .filter((n) => n.length > 0);

        imports.push({ rawSpecifier: fromMatch[1], symbols, line, typeOnly: false, dynamic: false });
      }
    }

    return imports;
  }

  /**
   * Top-level public names, or the `__all__` list when the module declares one.
   */
  private extractExports(lines: string[], code: string[]): ExportedSymbol[] {
    const declared = new Map<string, ExportedSymbol>();

    for (let i = 0; i < code.length; i++) {
      const text = code[i] ?? '';
      const line = i + 1;

      const defMatch = text.match(/^(?:async\s+)?def\s+(\w+)/);
      if (defMatch?.[1]) {
        declared.set(defMatch[1], { name: defMatch[1], kind: 'function', line });
        continue;
      }
      const classMatch = text.match(/^class\s+(\w+)/);
      if (classMatch?.[1]) {
        declared.set(classMatch[1], { name: classMatch[1], kind: 'class', line });
        continue;
      }
      const assignMatch = text.match(/^([A-Za-z_]\w*)\s*(?::[^=]+)?=(?!=)/);
      if (assignMatch?.[1] && !declared.has(assignMatch[1])) {
        declared.set(assignMatch[1], { name: assignMatch[1], kind: 'variable', line });
      }
    }

    const allList = this.readAllList(lines);
    if (allList) {
      return allList.map((name) => declared.get(name) ?? { name, kind: 'variable', line: 1 });
    }

    return [...declared.values()].filter((symbol) => !symbol.name.startsWith('_'));
  }

  /**
   * Names listed in `__all__ = [...]`, possibly spanning lines.
   */
  private readAllList(lines: string[]): string[] | null {
    for (let i = 0; i < lines.length; i++) {
      const trimmed = (lines[i] ?? '').trim();
      if (!/^__all__\s*=\s*[[(]/.test(trimmed)) continue;

      let content = trimmed.replace(/^__all__\s*=\s*[[(]/, '');
      let j = i;
      while (!/[\])]/.test(content) && j + 1 < lines.length) {
        j++;
        content += ' ' + (lines[j] ?? '').trim();
      }
      return content
        .replace(/[\])].*$/, '')
        .split(',')
        .map((s) => s.trim().replace(/['"]/g, ''))
        .filter((s) => s.length > 0);
    }
    return null;
  }

  private extractCalls(code: string[]): RawCall[] {
    const calls: RawCall[] = [];
    const callPattern = /(?:([A-Za-z_][\w.]*?)\.)?([A-Za-z_]\w*)\s*\(/g;

    for (let i = 0; i < code.length; i++) {
      const text = code[i] ?? '';
      const trimmed = text.trim();

      // Skip imports and definitions
      if (/^(?:import|from)\s/.test(trimmed)) continue;
      if (/^(?:async\s+)?def\s/.test(trimmed) || /^class\s/.test(trimmed)) continue;

      callPattern.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = callPattern.exec(text)) !== null) {
        const receiver = match[1];
        const name = match[2] ?? '';
        if (!receiver && CALL_KEYWORDS.has(name)) continue;
        // Part of a longer expression such as `x[0].name(` or a number literal
        const before = text[match.index - 1];
        if (before !== undefined && /[\w.]/.test(before)) continue;

        calls.push({
          callee: receiver ? `${receiver}.${name}` : name,
          receiver,
          line: i + 1,
          column: match.index + 1,
          endLine: i + 1,
          isConstructorCall: /^[A-Z]/.test(name) && !receiver,
        });
      }
    }

    return calls;
  }

  /**
   * `except ...:` blocks whose body is only `pass` or `...`.
   */
  private extractEmptyHandlers(code: string[]): CallSite[] {
    const handlers: CallSite[] = [];

    for (let i = 0; i < code.length; i++) {
      const text = code[i] ?? '';
      const header = text.match(/^(\s*)except\b[^:]*:\s*(.*)$/);
      if (!header) continue;

      const indent = (header[1] ?? '').length;
      const inline = (header[2] ?? '').trim();
      const site = { callee: 'except', line: i + 1, column: indent + 1 };

      if (inline !== '') {
        if (isNoOp(inline)) handlers.push({ ...site, endLine: i + 1 });
        continue;
      }

      let endLine = i + 1;
      let onlyNoOps = true;
      let sawStatement = false;
      for (let j = i + 1; j < code.length; j++) {
        const body = code[j] ?? '';
        if (body.trim() === '') continue;
        if (body.length - body.trimStart().length <= indent) break;
        sawStatement = true;
        endLine = j + 1;
        if (!isNoOp(body.trim())) {
          onlyNoOps = false;
          break;
        }
      }

      if (sawStatement && onlyNoOps) handlers.push({ ...site, endLine });
    }

    return handlers;
  }

  dispose(): void {
    // No resources to clean up for regex-based parsing
  }
}

function isNoOp(statement: string): boolean {
  return statement === 'pass' || statement === '...';
}
