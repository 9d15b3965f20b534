/** Joins a download path and an archive name with exactly one slash. */
export function buildUrl(basePath: string, fileName: string): string {
    const base = basePath.endsWith('/') ? basePath.slice(0, -1) : basePath;
    const file = fileName.startsWith('/') ? fileName.slice(1) : fileName;
    return `${base}/${file}`;
}
