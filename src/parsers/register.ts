/**
 * Registers the built-in language parsers.
 */
import { ParserRegistry } from './parser-registry.js';
import { TypeScriptParser } from './typescript.js';
import { PythonParser } from './python.js';
import { GoParser } from './go.js';

/**
 * Create a registry with every built-in parser. Parsers are instantiated lazily.
 */
export function createParserRegistry(): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register('typescript', () => new TypeScriptParser(), {
    '.ts': 'typescript',
    '.tsx': 'typescript',
    '.mts': 'typescript',
    '.cts': 'typescript',
    '.js': 'javascript',
    '.jsx': 'javascript',
    '.mjs': 'javascript',
    '.cjs': 'javascript',
  });
  registry.register('python', () => new PythonParser(), { '.py': 'python' });
  registry.register('go', () => new GoParser(), { '.go': 'go' });
  return registry;
}
