export type PackageVariables = ReadonlyMap<string, string>;

// Package name -> that package's raw variables
export type PackageIndex = ReadonlyMap<string, PackageVariables>;

export interface PackageDescriptor {
    name: string;
    variables: PackageVariables; // Raw values keyed by name without the $(package)_ prefix
}

export type CheckStatus = 'ok' | 'error' | 'skip';

export type FailureReason =
    | 'parse-incomplete'
    | 'missing-field'
    | 'unresolved-reference'
    | 'network-unreachable'
    | 'unexpected-failure';

export interface CheckResult {
    package: string;
    url?: string;
    status: CheckStatus;
    statusCode?: number;
    message: string;
    reason?: FailureReason; // Absent for 'ok'
}

export interface UrlCheckOutcome {
    reachable: boolean;
    code: number; // 0 when no HTTP response was received
    message: string;
}

export interface PackageOverride {
    acceptStatus?: number[]; // Extra HTTP status codes treated as reachable
    fileVariable?: string; // Variable preferred for the archive filename
}

export interface UrlCheckConfig {
    packagesDir: string;
    fileExtension: string;
    excludedFiles: string[]; // Matched by exact file name
    timeoutMs: number;
    userAgent: string;
    reportFile: string;
    overrides: Record<string, PackageOverride>;
}
