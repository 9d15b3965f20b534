import { stat, writeFile } from 'fs/promises';
import { DependencyUrlChecker, type FetchLike } from './checker.js';
import { CONFIG_FILE, loadConfig } from './config.js';
import { listPackageFiles, loadPackageIndex } from './packages.js';
import { generateMarkdownReport, reportResults, summarize } from './report.js';

export interface RunOptions {
    configPath?: string;
    fetch?: FetchLike;
}

async function isDirectory(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Runs one audit and returns the process exit code: 1 when any file reports an error
 * or the packages directory is missing or empty, 0 otherwise. Skips do not count.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
    try {
        const config = await loadConfig(options.configPath ?? CONFIG_FILE);
        const packagesDir = argv[0] ?? config.packagesDir; // Optional directory (first argument)

        if (!(await isDirectory(packagesDir))) {
            console.error(`Error: directory ${packagesDir} not found`);
            return 1;
        }

        const files = await listPackageFiles(packagesDir, config);
        if (files.length === 0) {
            console.error(`No ${config.fileExtension} files found in ${packagesDir}`);
            return 1;
        }

        console.log('Loading package information...');
        const index = await loadPackageIndex(packagesDir, config);
        console.log(`Loaded ${index.size} packages.`);

        const checker = new DependencyUrlChecker({ ...config, fetch: options.fetch });
        const results = await checker.checkAll(files, index);

        reportResults(results);

        await writeFile(config.reportFile, generateMarkdownReport(results), 'utf-8');
        console.log(`\n📄 Report written to ${config.reportFile}`);

        return summarize(results).error > 0 ? 1 : 0;
    } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : String(error));
        return 1;
    }
}
