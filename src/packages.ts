import { readdir, readFile } from 'fs/promises';
import { extname, join } from 'path';
import { parseDescriptor } from './extractor.js';
import type { PackageIndex, PackageVariables, UrlCheckConfig } from './types.js';

type PackageFileOptions = Pick<UrlCheckConfig, 'fileExtension' | 'excludedFiles'>;

/**
 * Lists the package files of a directory, sorted by file name. The package-list manifest
 * and the example package are excluded by exact name.
 */
export async function listPackageFiles(directory: string, options: PackageFileOptions): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });

    return entries
        .filter(entry => !entry.isDirectory()) // Symlinked package files count
        .map(entry => entry.name)
        .filter(name => extname(name) === options.fileExtension && !options.excludedFiles.includes(name))
        .sort()
        .map(name => join(directory, name));
}

/**
 * Builds the cross-file index: every package's raw variables keyed by its declared name.
 * Files without a `package=` line are left out.
 */
export async function loadPackageIndex(directory: string, options: PackageFileOptions): Promise<PackageIndex> {
    const index = new Map<string, PackageVariables>();

    for (const file of await listPackageFiles(directory, options)) {
        const descriptor = parseDescriptor(await readFile(file, 'utf-8'));
        if (descriptor) {
            index.set(descriptor.name, descriptor.variables);
        }
    }

    return index;
}
