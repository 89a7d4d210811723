import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type HarnessConfig, type HarnessConfigInput } from '../../src/config.js';

export const FAKE_PROGRAM = fileURLToPath(new URL('../fixtures/fake-program.mjs', import.meta.url));

export async function withTempDir<T>(run: (dir: string) => Promise<T> | T): Promise<T> {
    const root = process.env.BITMAP_ORACLE_TEST_ROOT ?? os.tmpdir();
    const dir = fs.mkdtempSync(path.join(root, 'case-'));
    try {
        return await run(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

/**
 * Config that runs the fake program through the current node binary.
 */
export function fakeConfig(scratchDir: string, overrides: Partial<HarnessConfigInput> = {}): HarnessConfig {
    return loadConfig({
        exec: process.execPath,
        execArgs: [FAKE_PROGRAM],
        scratchDir,
        seed: 1234,
        trials: 2,
        width: 12,
        height: 9,
        ...overrides,
    }, {});
}

/** Report sink that collects lines for assertions. */
export function collectReport(): { lines: string[]; sink: (line: string) => void } {
    const lines: string[] = [];
    return { lines, sink: (line: string) => { lines.push(line); } };
}

/** Splits serialized bitmap text into non-empty lines. */
export function textLines(text: string): string[] {
    return text.split('\n').filter(l => l !== '');
}
