import type { CheckResult, CheckStatus } from './types.js';

export interface ResultSummary {
    ok: number;
    error: number;
    skip: number;
}

const STATUS_EMOJI: Record<CheckStatus, string> = {
    ok: '✅',
    error: '❌',
    skip: '➖',
};

export function summarize(results: CheckResult[]): ResultSummary {
    const summary: ResultSummary = { ok: 0, error: 0, skip: 0 };
    for (const result of results) {
        summary[result.status]++;
    }
    return summary;
}

export function formatStatus(result: CheckResult): string {
    const emoji = STATUS_EMOJI[result.status];
    if (result.status === 'error') {
        return `${emoji} ${result.message} (HTTP ${result.statusCode ?? 'N/A'})`;
    }
    return `${emoji} ${result.message}`;
}

export function formatProgressLine(result: CheckResult, position: number, total: number): string {
    return `[${position}/${total}] Checking ${result.package}... ${formatStatus(result)}`;
}

export function formatSummaryLine(summary: ResultSummary): string {
    return `Summary: Ok: ${summary.ok}, Errors: ${summary.error}, Skipped: ${summary.skip}`;
}

// ============================================================================
// Console Output
// ============================================================================

export function reportResults(results: CheckResult[]): void {
    const summary = summarize(results);

    console.log(`\n${'='.repeat(70)}`);
    console.log(formatSummaryLine(summary));

    if (summary.error === 0) {
        console.log('✅ All dependency URLs are reachable!');
        return;
    }

    console.log('\nDetailed error information:');
    for (const result of results.filter(r => r.status === 'error')) {
        console.log(`  ${STATUS_EMOJI.error} ${result.package.padEnd(30)} - ${result.message} (HTTP ${result.statusCode ?? 'N/A'})`);
        console.log(`    URL: ${result.url ?? 'N/A'}`);
    }
}

// ============================================================================
// Report Generation
// ============================================================================

function escapeTableCell(text: string): string {
    return text.replace(/\|/g, '\\|');
}

export function generateMarkdownReport(results: CheckResult[], generatedAt: Date = new Date()): string {
    const summary = summarize(results);
    const lines: string[] = [];

    lines.push('# Dependency URL Report');
    lines.push('');
    lines.push(`Generated: ${generatedAt.toISOString()}`);
    lines.push('');

    if (summary.error === 0) {
        lines.push('## ✅ All dependency URLs are reachable!');
        lines.push('');
        lines.push(`- ✅ **Ok:** ${summary.ok}`);
        lines.push(`- ➖ **Skipped:** ${summary.skip}`);
        return lines.join('\n');
    }

    lines.push('## Summary');
    lines.push('');
    lines.push(`- ❌ **Errors:** ${summary.error}`);
    lines.push(`- ✅ **Ok:** ${summary.ok}`);
    lines.push(`- ➖ **Skipped:** ${summary.skip}`);
    lines.push('');
    lines.push('## Unreachable Dependencies');
    lines.push('');
    lines.push('| Package | URL | Status | Message |');
    lines.push('|---------|-----|--------|---------|');

    const failures = results
        .filter(r => r.status === 'error')
        .sort((a, b) => a.package.localeCompare(b.package));

    for (const failure of failures) {
        const url = failure.url ? `[${failure.url}](${failure.url})` : 'N/A';
        const status = failure.statusCode ? `HTTP ${failure.statusCode}` : 'N/A';
        lines.push(`| ${failure.package} | ${url} | ${status} | ${escapeTableCell(failure.message)} |`);
    }

    return lines.join('\n');
}
