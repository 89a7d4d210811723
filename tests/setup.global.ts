import { afterAll, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});

// GLOBAL TEST SANDBOX & NETWORK BLOCKING
const blockMsg = 'NETWORK BLOCKED: Unit tests must not access external resources. Use vi.spyOn() or mocks.';

vi.mock('http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('http')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

vi.mock('https', async (importOriginal) => {
  const actual = await importOriginal<typeof import('https')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

globalThis.fetch = async () => { throw new Error(blockMsg); };

// Keep pino quiet unless a test asks for output
process.env.BITMAP_ORACLE_LOG_LEVEL = 'silent';

// Scratch sandbox; tests create their own subdirectories below it
const testScratchRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'bitmap-oracle-test-'));
process.env.BITMAP_ORACLE_TEST_ROOT = testScratchRoot;

afterAll(() => {
  fs.rmSync(testScratchRoot, { recursive: true, force: true });
});
