import { describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG } from '../src/config.js';
import { listPackageFiles, loadPackageIndex } from '../src/packages.js';

const PACKAGES_DIR = fileURLToPath(new URL('./fixtures/packages', import.meta.url));

describe('listPackageFiles', () => {
    it('lists package files in name order, without the manifest and the example package', async () => {
        const files = await listPackageFiles(PACKAGES_DIR, DEFAULT_CONFIG);
        expect(files.map(file => basename(file))).toEqual([
            'fontconfig.mk',
            'native_protobuf.mk',
            'nofile.mk',
            'noname.mk',
            'nopath.mk',
            'protobuf.mk',
            'unresolved.mk',
            'zeromq.mk',
            'zlib.mk',
        ]);
    });

    it('honours a custom exclusion list', async () => {
        const files = await listPackageFiles(PACKAGES_DIR, { fileExtension: '.mk', excludedFiles: [] });
        expect(files.map(file => basename(file))).toContain('dummy.mk');
        expect(files.map(file => basename(file))).toContain('packages.mk');
    });

    it('includes symlinked package files but not directories', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'url-check-packages-'));
        try {
            await writeFile(join(dir, 'expat.txt'), 'package=expat\n');
            await symlink(join(dir, 'expat.txt'), join(dir, 'expat.mk'));
            await mkdir(join(dir, 'patches.mk'));

            const files = await listPackageFiles(dir, DEFAULT_CONFIG);
            expect(files).toEqual([join(dir, 'expat.mk')]);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('rejects a missing directory', async () => {
        await expect(listPackageFiles(`${PACKAGES_DIR}/missing`, DEFAULT_CONFIG)).rejects.toThrow('ENOENT');
    });
});

describe('loadPackageIndex', () => {
    it('keys packages by declared name and skips files without one', async () => {
        const index = await loadPackageIndex(PACKAGES_DIR, DEFAULT_CONFIG);
        expect([...index.keys()]).toEqual([
            'fontconfig',
            'native_protobuf',
            'nofile',
            'nopath',
            'protobuf',
            'unresolved',
            'zeromq',
            'zlib',
        ]);
        expect(index.get('native_protobuf')?.get('version')).toBe('3.21.12');
        expect(index.get('zlib')?.get('file_name')).toBe('$(package)-$($(package)_version).tar.gz');
    });
});
