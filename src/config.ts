import { readFile } from 'fs/promises';
import type { UrlCheckConfig } from './types.js';

export const CONFIG_FILE = 'url-check.config.json';

// Some download hosts reject requests that do not look like a browser
const BROWSER_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: UrlCheckConfig = {
    packagesDir: 'depends/packages',
    fileExtension: '.mk',
    excludedFiles: ['packages.mk', 'dummy.mk'],
    timeoutMs: 30_000,
    userAgent: BROWSER_USER_AGENT,
    reportFile: 'report.md',
    overrides: {
        // The fontconfig host answers 418 while serving the archive
        fontconfig: { acceptStatus: [418] },
        // download_file holds the mingw32 archive name; file_name is the default build's
        zeromq: { fileVariable: 'file_name' },
    },
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Returns a description of the first malformed override entry, if any
export function findOverrideProblem(overrides: unknown): string | undefined {
    if (!isPlainObject(overrides)) {
        return 'overrides must be an object';
    }

    for (const [name, override] of Object.entries(overrides)) {
        if (!isPlainObject(override)) {
            return `override for "${name}" must be an object`;
        }
        const { acceptStatus, fileVariable } = override;
        if (acceptStatus !== undefined && !(Array.isArray(acceptStatus) && acceptStatus.every(Number.isInteger))) {
            return `override for "${name}": acceptStatus must be a list of status codes`;
        }
        if (fileVariable !== undefined && typeof fileVariable !== 'string') {
            return `override for "${name}": fileVariable must be a string`;
        }
    }

    return undefined;
}

export function mergeConfig(base: UrlCheckConfig, overlay: Partial<UrlCheckConfig>): UrlCheckConfig {
    return {
        ...base,
        ...overlay,
        overrides: { ...base.overrides, ...overlay.overrides },
    };
}

/**
 * Reads the optional JSON config file and lays it over {@link DEFAULT_CONFIG}.
 * A missing file yields the defaults.
 */
export async function loadConfig(configPath: string = CONFIG_FILE): Promise<UrlCheckConfig> {
    let content: string;
    try {
        content = await readFile(configPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return DEFAULT_CONFIG;
        }
        throw new Error(`Failed to load config from ${configPath}: ${error}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new Error(`Failed to load config from ${configPath}: ${error}`);
    }

    if (!isPlainObject(parsed)) {
        throw new Error(`Failed to load config from ${configPath}: expected a JSON object`);
    }

    const overlay = parsed as Partial<UrlCheckConfig>;
    const problem = overlay.overrides === undefined ? undefined : findOverrideProblem(overlay.overrides);
    if (problem) {
        throw new Error(`Failed to load config from ${configPath}: ${problem}`);
    }

    return mergeConfig(DEFAULT_CONFIG, overlay);
}
