/**
 * I/O isolation: pure layers may not call deny-listed primitives or import
 * deny-listed modules.
 */
import type { Severity } from '../config/schema.js';
import { findDeniedModule } from '../ingest/call-patterns.js';
import { denyFamilyOf, type DenyMatch, type SourceLanguage } from '../ingest/types.js';
import { BaseRule, lineAt, siteRange } from './base.js';
import type { IoIsolationViolation, RuleContext } from './types.js';

export class IoIsolationRule extends BaseRule {
  readonly id = 'io-isolation';
  readonly category = 'io-isolation';
  readonly defaultSeverity: Severity = 'error';
  readonly description = 'Pure layers must not perform I/O directly';

  evaluate({ graph, policy }: RuleContext, severity: Severity): IoIsolationViolation[] {
    const violations: IoIsolationViolation[] = [];

    for (const module of graph.modules) {
      const layer = module.layer;
      if (layer === null || !policy.io.pureLayers.has(layer)) continue;

      for (const site of module.facts.ioCallSites) {
        const kind = site.matched?.kind ?? 'process';
        const pattern = site.matched?.pattern ?? site.callee;
        violations.push({
          ...this.base(
            module,
            severity,
            siteRange(site),
            `${kind} call '${site.callee}' in layer '${layer}' (matched '${pattern}')`,
            kind
          ),
          category: 'io-isolation',
          layer,
          primitive: site.callee,
          ioKind: kind,
          via: 'call',
        });
      }

      const modules = policy.io.deny[denyFamilyOf(module.facts.language)].modules;
      for (const imp of module.externals) {
        if (imp.resolution !== 'external') continue;
        const matched = matchSpecifier(imp.rawSpecifier, module.facts.language, (candidate) =>
          findDeniedModule(candidate, modules)
        );
        if (!matched) continue;
        violations.push({
          ...this.base(
            module,
            severity,
            lineAt(imp.line),
            `${matched.kind} module '${imp.rawSpecifier}' imported in layer '${layer}' (matched '${matched.pattern}')`,
            matched.kind
          ),
          category: 'io-isolation',
          layer,
          primitive: imp.rawSpecifier,
          ioKind: matched.kind,
          via: 'import',
        });
      }
    }

    return violations;
  }

  protected override getFixHint(kind?: string): string {
    return `Move the ${kind ?? 'I/O'} access behind a contract and inject the implementation`;
  }
}

/**
 * Try the specifier, then each parent package ('os.path' → 'os',
 * 'pg/lib/client' → 'pg/lib', 'pg').
 */
export function matchSpecifier(
  specifier: string,
  language: SourceLanguage,
  find: (candidate: string) => DenyMatch | null
): DenyMatch | null {
  const separator = language === 'python' ? '.' : '/';
  const parts = specifier.split(separator);
  for (let length = parts.length; length >= 1; length--) {
    const candidate = parts.slice(0, length).join(separator);
    if (candidate === '') continue;
    const found = find(candidate);
    if (found) return found;
  }
  return null;
}
