import * as fs from 'fs';
import * as path from 'path';
import { PreconditionViolationError } from '../errors.js';

/**
 * Ensures `dir` exists and removes every regular file inside it. Any other
 * entry (directory, symlink, socket...) aborts the run: the scratch directory
 * only ever holds fixtures this harness wrote.
 *
 * @returns number of files removed
 */
export function prepareScratchDir(dir: string): number {
    fs.mkdirSync(dir, { recursive: true });

    const entries = fs.readdirSync(dir, { withFileTypes: true });
    const foreign = entries.filter(e => !e.isFile());
    if (foreign.length > 0) {
        throw new PreconditionViolationError(
            `Scratch directory ${dir} contains non-file entries: ${foreign.map(e => e.name).join(', ')}`
        );
    }

    for (const entry of entries) {
        fs.unlinkSync(path.join(dir, entry.name));
    }
    return entries.length;
}
