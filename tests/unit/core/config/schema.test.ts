/**
 * Tests for the configuration schema defaults.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, BUILTIN_DENY_LIST, DEFAULT_LAYERS } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should apply defaults to an empty object', () => {
    const config = ConfigSchema.parse({});

    expect(config.version).toBe('1.0');
    expect(config.layers.map((l) => l.name)).toEqual(['infrastructure', 'contracts', 'business']);
    expect(config.io_isolation.layers).toEqual(['business']);
    expect(config.boundaries.public_api).toBe('index.*');
    expect(config.type_only).toEqual({ declaration_kinds: ['interface', 'type', 'enum'], max_call_sites: 0 });
    expect(config.cycles.allow).toEqual([]);
    expect(config.rules).toEqual({});
  });

  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ layers: null, resolve: null });

    expect(config.layers).toHaveLength(DEFAULT_LAYERS.length);
    expect(config.resolve).toEqual({ aliases: {}, roots: ['.'] });
  });

  it('should fill layer defaults', () => {
    const config = ConfigSchema.parse({ layers: [{ name: 'core', paths: ['core/**'] }] });

    expect(config.layers).toEqual([{ name: 'core', paths: ['core/**'], can_import: [], exclude: [] }]);
  });

  it('should fall back to the built-in deny-list per language', () => {
    const config = ConfigSchema.parse({
      io_isolation: { deny: { python: { calls: [{ pattern: 'open', kind: 'filesystem' }] } } },
    });

    expect(config.io_isolation.deny.python.calls).toEqual([{ pattern: 'open', kind: 'filesystem' }]);
    expect(config.io_isolation.deny.python.modules).toEqual([]);
    expect(config.io_isolation.deny.typescript).toEqual(BUILTIN_DENY_LIST.typescript);
  });

  it('should ship deny-lists for every language family', () => {
    expect(BUILTIN_DENY_LIST.typescript.calls.map((c) => c.pattern)).toContain('fs.*');
    expect(BUILTIN_DENY_LIST.python.calls.map((c) => c.pattern)).toContain('open');
    expect(BUILTIN_DENY_LIST.go.calls.length).toBeGreaterThan(0);
  });

  it('should reject an unknown I/O kind', () => {
    const result = ConfigSchema.safeParse({
      io_isolation: { deny: { go: { calls: [{ pattern: 'os.Open', kind: 'disk' }] } } },
    });

    expect(result.success).toBe(false);
  });

  it('should reject a non-integer call-site threshold', () => {
    expect(ConfigSchema.safeParse({ type_only: { max_call_sites: 1.5 } }).success).toBe(false);
  });
});
