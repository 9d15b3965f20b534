import { describe, it, expect } from 'vitest';
import {
    MAX_SAME_PACKAGE_ITERATIONS,
    orderPackageCandidates,
    resolve,
    resolveCrossPackage,
    resolveValue,
} from '../src/resolver.js';
import type { PackageIndex, PackageVariables } from '../src/types.js';

function vars(entries: Record<string, string>): PackageVariables {
    return new Map(Object.entries(entries));
}

describe('resolve (same package)', () => {
    const foo = vars({ version: '1.2', file_name: 'foo-$(foo_version).tar.gz' });

    it('expands nested references to a fixed point', () => {
        expect(resolve('$(foo_file_name)', foo, 'foo')).toBe('foo-1.2.tar.gz');
    });

    it('substitutes the package placeholder before looking up variables', () => {
        expect(resolve('$(package)-$($(package)_version).zip', foo, 'foo')).toBe('foo-1.2.zip');
    });

    it('replaces every occurrence of a resolved placeholder', () => {
        expect(resolve('$(foo_version)/$(foo_version)', foo, 'foo')).toBe('1.2/1.2');
    });

    it('resolves variable names that contain underscores', () => {
        const variables = vars({ download_path: 'https://example.org/$(foo_sub_dir)', sub_dir: 'v1' });
        expect(resolve('$(foo_download_path)', variables, 'foo')).toBe('https://example.org/v1');
    });

    it('keeps resolving past placeholders it cannot expand', () => {
        expect(resolve('$(bar_version)-$(foo_version)', foo, 'foo')).toBe('$(bar_version)-1.2');
    });

    it('is idempotent on fully resolved strings', () => {
        const once = resolve('$(foo_file_name)', foo, 'foo');
        expect(resolve(once, foo, 'foo')).toBe(once);
    });

    it('stops after the iteration bound on self-growing definitions', () => {
        const growing = vars({ a: '$(foo_a)x' });
        expect(resolve('$(foo_a)', growing, 'foo')).toBe('$(foo_a)' + 'x'.repeat(MAX_SAME_PACKAGE_ITERATIONS));
    });

    it('terminates on mutually recursive definitions', () => {
        const cycle = vars({ a: '$(foo_b)', b: '$(foo_a)' });
        expect(resolve('$(foo_a)', cycle, 'foo')).toBe('$(foo_a)');
    });
});

describe('resolveCrossPackage', () => {
    const index: PackageIndex = new Map([
        ['foo', vars({ version: '1.2' })],
        ['bar', vars({ file_name: 'lib-$(foo_version)' })],
        ['native', vars({ protobuf_version: '2.0' })],
        ['native_protobuf', vars({ version: '3.21.12', download_path: 'https://example.org/v$($(package)_version)' })],
    ]);

    it('substitutes variables owned by another package', () => {
        expect(resolveCrossPackage('lib-$(foo_version)', 'bar', index)).toBe('lib-1.2');
    });

    it('resolves the foreign value relative to its owning package', () => {
        expect(resolveCrossPackage('$(native_protobuf_download_path)', 'qt', index)).toBe('https://example.org/v3.21.12');
    });

    it('prefers the longest matching package name', () => {
        expect(resolveCrossPackage('$(native_protobuf_version)', 'qt', index)).toBe('3.21.12');
    });

    it('handles several placeholders in one round', () => {
        expect(resolveCrossPackage('$(foo_version)+$(native_protobuf_version)', 'qt', index)).toBe('1.2+3.21.12');
    });

    it('follows chains through several packages', () => {
        expect(resolveCrossPackage('$(bar_file_name).tar.gz', 'qt', index)).toBe('lib-1.2.tar.gz');
    });

    it('never resolves against the package being checked', () => {
        expect(resolveCrossPackage('$(foo_version)', 'foo', index)).toBe('$(foo_version)');
    });

    it('leaves unknown placeholders untouched', () => {
        expect(resolveCrossPackage('$(missing_version)-$(foo_version)', 'bar', index)).toBe('$(missing_version)-1.2');
    });

    it('does not modify the index and gives the same answer twice', () => {
        const before = JSON.stringify([...index].map(([name, variables]) => [name, [...variables]]));
        const first = resolveCrossPackage('$(bar_file_name)', 'qt', index);
        const second = resolveCrossPackage('$(bar_file_name)', 'qt', index);
        expect(second).toBe(first);
        expect(JSON.stringify([...index].map(([name, variables]) => [name, [...variables]]))).toBe(before);
    });
});

describe('orderPackageCandidates', () => {
    it('sorts by descending length, then alphabetically', () => {
        expect(orderPackageCandidates(['qt', 'native', 'zlib', 'native_protobuf', 'expat'])).toEqual([
            'native_protobuf',
            'native',
            'expat',
            'zlib',
            'qt',
        ]);
    });
});

describe('resolveValue', () => {
    it('falls back to other packages only for what is left', () => {
        const index: PackageIndex = new Map([['foo', vars({ version: '1.2' })]]);
        const bar = vars({ suffix: 'tar.gz' });
        expect(resolveValue('bar-$(foo_version).$(bar_suffix)', bar, 'bar', index)).toBe('bar-1.2.tar.gz');
    });
});
