/// <reference types="vitest/config" />
/**
 * Root Vitest: single node project covering every workspace package.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const Dirname = path.dirname(fileURLToPath(import.meta.url));

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    cacheDir: 'node_modules/.vitest',
    output: {
        chaiConfig: { includeStack: true, showDiff: true, truncateThreshold: 0 },
    },
    patterns: {
        testExclude: ['**/node_modules/**', '**/dist/**'],
        testInclude: ['packages/*/tests/**/*.spec.ts'],
    },
    setupFiles: [path.resolve(Dirname, 'packages/test-utils/src/setup.ts')],
    timeouts: { hook: 10_000, test: 10_000 },
} as const);

// --- [EXPORT] ----------------------------------------------------------------

export default defineConfig({
    cacheDir: B.cacheDir,
    test: {
        chaiConfig: { ...B.output.chaiConfig },
        clearMocks: true,
        environment: 'node',
        exclude: [...B.patterns.testExclude],
        hookTimeout: B.timeouts.hook,
        include: [...B.patterns.testInclude],
        isolate: true,
        mockReset: true,
        passWithNoTests: false,
        pool: 'threads',
        root: Dirname,
        setupFiles: [...B.setupFiles],
        testTimeout: B.timeouts.test,
    },
});
