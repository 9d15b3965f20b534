import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { extractVariables } from './extractor.js';
import { formatProgressLine } from './report.js';
import { hasUnresolvedPlaceholder, resolveValue } from './resolver.js';
import type { CheckResult, PackageIndex, PackageOverride, UrlCheckConfig, UrlCheckOutcome } from './types.js';
import { buildUrl } from './url.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CheckerOptions extends Pick<UrlCheckConfig, 'timeoutMs' | 'userAgent' | 'overrides'> {
    fetch?: FetchLike;
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const CONNECTION_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'UND_ERR_SOCKET',
    'CERT_HAS_EXPIRED',
    'DEPTH_ZERO_SELF_SIGNED_CERT',
    'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
    'ERR_TLS_CERT_ALTNAME_INVALID',
]);

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Maps a rejected fetch to an outcome message. Undici reports transport problems as
 * `TypeError('fetch failed')` with the real error in `cause`.
 */
export function classifyFetchError(error: unknown): string {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return 'Timeout';
    }

    const cause = error instanceof Error ? error.cause : undefined;
    const code = errorCode(cause) ?? errorCode(error);

    if (code && TIMEOUT_CODES.has(code)) {
        return 'Timeout';
    }
    if (cause instanceof Error && cause.message.includes('redirect count exceeded')) {
        return 'Too Many Redirects';
    }
    if (code && CONNECTION_CODES.has(code)) {
        return 'Connection Error';
    }

    const message = error instanceof Error ? error.message : String(error);
    return cause instanceof Error ? `Error: ${message} (${cause.message})` : `Error: ${message}`;
}

function fileStem(filePath: string): string {
    return basename(filePath, extname(filePath));
}

export class DependencyUrlChecker {
    private readonly fetch: FetchLike;
    private readonly timeoutMs: number;
    private readonly userAgent: string;
    private readonly overrides: Record<string, PackageOverride>;

    constructor(options: CheckerOptions) {
        this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
        this.timeoutMs = options.timeoutMs;
        this.userAgent = options.userAgent;
        this.overrides = options.overrides;
    }

    private overrideFor(packageName: string): PackageOverride {
        return Object.hasOwn(this.overrides, packageName) ? this.overrides[packageName] : {};
    }

    async checkUrl(url: string, packageName: string): Promise<UrlCheckOutcome> {
        let response: Response;
        try {
            response = await this.fetch(url, {
                method: 'HEAD',
                redirect: 'follow',
                headers: { 'User-Agent': this.userAgent },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            return { reachable: false, code: 0, message: classifyFetchError(error) };
        }

        const code = response.status;
        if (code === 200) {
            return { reachable: true, code, message: 'Ok' };
        }
        if (this.overrideFor(packageName).acceptStatus?.includes(code)) {
            return { reachable: true, code, message: `Ok (HTTP ${code} accepted by override)` };
        }
        if (code === 404) {
            return { reachable: false, code, message: 'Not Found' };
        }
        return { reachable: false, code, message: `HTTP ${code}` };
    }

    private chooseFileVariable(packageName: string, variables: ReadonlyMap<string, string>): string | undefined {
        const preferred = this.overrideFor(packageName).fileVariable;
        if (preferred && variables.has(preferred)) {
            return preferred;
        }
        if (variables.has('download_file')) {
            return 'download_file';
        }
        return variables.has('file_name') ? 'file_name' : undefined;
    }

    async checkDependencyFile(filePath: string, index: PackageIndex): Promise<CheckResult> {
        try {
            const { name, variables } = extractVariables(await readFile(filePath, 'utf-8'));

            if (name === undefined) {
                return {
                    package: fileStem(filePath),
                    status: 'error',
                    message: 'Failed to determine package name',
                    reason: 'parse-incomplete',
                };
            }

            const rawPath = variables.get('download_path');
            if (rawPath === undefined) {
                return {
                    package: name,
                    status: 'skip',
                    message: 'Missing required variable (download_path)',
                    reason: 'missing-field',
                };
            }

            const fileVariable = this.chooseFileVariable(name, variables);
            const rawFile = fileVariable === undefined ? undefined : variables.get(fileVariable);
            if (rawFile === undefined) {
                return {
                    package: name,
                    status: 'skip',
                    message: 'Missing required variable (download_file or file_name)',
                    reason: 'missing-field',
                };
            }

            const downloadPath = resolveValue(rawPath, variables, name, index);
            const fileName = resolveValue(rawFile, variables, name, index);

            if (hasUnresolvedPlaceholder(downloadPath) || hasUnresolvedPlaceholder(fileName)) {
                return {
                    package: name,
                    status: 'skip',
                    message: 'Failed to resolve all variables (possible cross-package references)',
                    reason: 'unresolved-reference',
                };
            }

            const url = buildUrl(downloadPath, fileName);
            const outcome = await this.checkUrl(url, name);

            return {
                package: name,
                url,
                status: outcome.reachable ? 'ok' : 'error',
                statusCode: outcome.code,
                message: outcome.message,
                reason: outcome.reachable ? undefined : 'network-unreachable',
            };
        } catch (error) {
            return {
                package: fileStem(filePath),
                status: 'error',
                message: `Error processing: ${error instanceof Error ? error.message : String(error)}`,
                reason: 'unexpected-failure',
            };
        }
    }

    /** Checks the files one at a time, in the order given, printing a line per file. */
    async checkAll(files: string[], index: PackageIndex): Promise<CheckResult[]> {
        const results: CheckResult[] = [];

        console.log(`\n🔍 Checking ${files.length} dependency files\n`);

        for (const [position, file] of files.entries()) {
            const result = await this.checkDependencyFile(file, index);
            results.push(result);
            console.log(formatProgressLine(result, position + 1, files.length));
        }

        return results;
    }
}
