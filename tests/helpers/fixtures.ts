/**
 * Builders for facts, policies and graphs used across unit tests.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { mergeConfig } from '../../src/core/config/loader.js';
import { compilePolicy, type AnalysisPolicy } from '../../src/core/config/policy.js';
import { buildModuleGraph } from '../../src/core/graph/builder.js';
import type { GoModule } from '../../src/core/graph/resolver.js';
import type { CallSite, ExportedSymbol, FileFacts, ImportRef, SourceLanguage } from '../../src/core/ingest/types.js';
import { classifyGraph } from '../../src/core/layers/classifier.js';
import type { ClassifiedModule } from '../../src/core/layers/types.js';
import type { RuleContext } from '../../src/core/rules/types.js';

export function languageOf(filePath: string): SourceLanguage {
  if (filePath.endsWith('.py')) return 'python';
  if (filePath.endsWith('.go')) return 'go';
  if (/\.(c|m)?jsx?$/.test(filePath)) return 'javascript';
  return 'typescript';
}

export function makeImport(rawSpecifier: string, line = 1, extra: Partial<ImportRef> = {}): ImportRef {
  return { rawSpecifier, symbols: ['*'], line, typeOnly: false, dynamic: false, ...extra };
}

export function makeSite(callee: string, line: number, extra: Partial<CallSite> = {}): CallSite {
  return { callee, line, column: 1, endLine: line, ...extra };
}

export function makeExport(name: string, kind: ExportedSymbol['kind'] = 'function', line = 1): ExportedSymbol {
  return { name, kind, line };
}

export function makeFacts(filePath: string, overrides: Partial<FileFacts> = {}): FileFacts {
  return {
    path: filePath,
    language: languageOf(filePath),
    imports: [],
    exports: [makeExport('run')],
    ioCallSites: [],
    emptyHandlerSites: [],
    callCount: 1,
    parseOk: true,
    parseErrors: [],
    ...overrides,
  };
}

export function makePolicy(config: unknown = {}): AnalysisPolicy {
  return compilePolicy(mergeConfig(config));
}

/**
 * Build and classify a graph from facts.
 */
export function makeContext(
  facts: readonly FileFacts[],
  config: unknown = {},
  goModules: readonly GoModule[] = []
): RuleContext {
  const policy = makePolicy(config);
  const graph = classifyGraph(buildModuleGraph(facts, { policy, goModules }), policy.layerPolicy);
  return { graph, policy };
}

/**
 * Module of a built context by path.
 */
export function moduleAt(context: RuleContext, filePath: string): ClassifiedModule {
  const index = context.graph.indexByPath.get(filePath);
  const module = index === undefined ? undefined : context.graph.modules[index];
  if (!module) throw new Error(`No module at ${filePath}`);
  return module;
}

/**
 * Create a temp directory populated with the given files.
 */
export async function createTempTree(files: Record<string, string | Uint8Array>): Promise<string> {
  const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'strata-test-'));
  for (const [relative, content] of Object.entries(files)) {
    const full = path.join(root, relative);
    await fs.promises.mkdir(path.dirname(full), { recursive: true });
    await fs.promises.writeFile(full, content);
  }
  return root;
}

export async function removeTempTree(root: string): Promise<void> {
  await fs.promises.rm(root, { recursive: true, force: true });
}
