import type { PackageIndex, PackageVariables } from './types.js';

export const SELF_PLACEHOLDER = '$(package)';
export const MAX_SAME_PACKAGE_ITERATIONS = 20;
export const MAX_CROSS_PACKAGE_ROUNDS = 10;

const IDENTIFIER_PLACEHOLDER_RE = /\$\(([A-Za-z_][A-Za-z0-9_]*)\)/g;
const ANY_PLACEHOLDER_RE = /\$\(([^)]+)\)/g;

interface Substitution {
    placeholder: string;
    value: string;
}

export function hasUnresolvedPlaceholder(value: string): boolean {
    return value.includes('$(');
}

function replaceAll(value: string, search: string, replacement: string): string {
    return value.split(search).join(replacement);
}

function splitAtLastUnderscore(key: string): [string, string] | undefined {
    const separator = key.lastIndexOf('_');
    if (separator <= 0 || separator === key.length - 1) {
        return undefined;
    }
    return [key.slice(0, separator), key.slice(separator + 1)];
}

// ============================================================================
// Same-package resolution
// ============================================================================

function findOwnReference(value: string, variables: PackageVariables, packageName: string): Substitution | undefined {
    const ownPrefix = `${packageName}_`;

    for (const [placeholder, key] of value.matchAll(IDENTIFIER_PLACEHOLDER_RE)) {
        // $($(package)_version) reads as $(<package>_version) once the package name is in
        const nested = splitAtLastUnderscore(key);
        if (nested && nested[0] === packageName) {
            const resolved = variables.get(nested[1]);
            if (resolved !== undefined) {
                return { placeholder, value: resolved };
            }
        }

        if (key.startsWith(ownPrefix)) {
            const resolved = variables.get(key.slice(ownPrefix.length));
            if (resolved !== undefined) {
                return { placeholder, value: resolved };
            }
        }
    }

    return undefined;
}

/**
 * Expands `$(package)` and references to the package's own variables until nothing changes.
 * Gives up after {@link MAX_SAME_PACKAGE_ITERATIONS} passes and returns whatever was expanded.
 */
export function resolve(value: string, variables: PackageVariables, packageName: string): string {
    let result = value;

    for (let iteration = 0; iteration < MAX_SAME_PACKAGE_ITERATIONS; iteration++) {
        let changed = false;

        if (result.includes(SELF_PLACEHOLDER)) {
            result = replaceAll(result, SELF_PLACEHOLDER, packageName);
            changed = true;
        }

        const substitution = findOwnReference(result, variables, packageName);
        if (substitution) {
            result = replaceAll(result, substitution.placeholder, substitution.value);
            changed = true;
        }

        if (!changed) {
            break;
        }
    }

    return result;
}

// ============================================================================
// Cross-package resolution
// ============================================================================

// Longer names first so that `native_protobuf` wins over `native`; ties break alphabetically
export function orderPackageCandidates(names: Iterable<string>): string[] {
    return [...names].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

function lookupForeignVariable(
    key: string,
    packageName: string,
    index: PackageIndex,
    candidates: string[],
): string | undefined {
    for (const owner of candidates) {
        if (!key.startsWith(`${owner}_`)) continue;

        const variables = index.get(owner);
        const raw = variables?.get(key.slice(owner.length + 1));
        if (variables && raw !== undefined) {
            return resolve(raw, variables, owner);
        }
    }

    const split = splitAtLastUnderscore(key);
    if (!split) return undefined;

    const [owner, variable] = split;
    const variables = owner === packageName ? undefined : index.get(owner);
    const raw = variables?.get(variable);
    if (variables && raw !== undefined) {
        return resolve(raw, variables, owner);
    }

    return undefined;
}

/**
 * Expands placeholders that name another package's variable, e.g. `$(native_protobuf_version)`.
 * Each round rewrites matches from the end of the string so earlier offsets stay valid.
 * The index is only read.
 */
export function resolveCrossPackage(value: string, packageName: string, index: PackageIndex): string {
    const candidates = orderPackageCandidates([...index.keys()].filter(name => name !== packageName));
    let result = value;

    for (let round = 0; round < MAX_CROSS_PACKAGE_ROUNDS; round++) {
        let changed = false;
        const matches = [...result.matchAll(ANY_PLACEHOLDER_RE)].reverse();

        for (const match of matches) {
            if (match.index === undefined) continue;

            const replacement = lookupForeignVariable(match[1], packageName, index, candidates);
            if (replacement === undefined) continue;

            result = result.slice(0, match.index) + replacement + result.slice(match.index + match[0].length);
            changed = true;
        }

        if (!changed) {
            break;
        }
    }

    return result;
}

/** Pass A, then pass B if placeholders are left over. */
export function resolveValue(
    value: string,
    variables: PackageVariables,
    packageName: string,
    index: PackageIndex,
): string {
    const local = resolve(value, variables, packageName);
    return hasUnresolvedPlaceholder(local) ? resolveCrossPackage(local, packageName, index) : local;
}
