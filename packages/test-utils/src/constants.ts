/**
 * Test constants: deterministic values for reproducible tests.
 */

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const env = (key: string): string | undefined => (typeof process === 'undefined' ? undefined : process.env[key]);
const seed = env('FC_SEED');

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    assets: {
        count: 12,
        ids: [
            'copper',
            'force-core',
            'iron',
            'magic-core',
            'monster-coin',
            'multitudation-vortex',
            'serene-spirit',
            'spirit-core',
            'stone',
            'thorium',
            'unstoppable-force',
            'void-core',
        ],
    },
    env: {
        ICONS_CACHE_CAPACITY: '8',
        ICONS_DEFAULT_SIZE: '24',
        LOG_LEVEL: 'Debug',
        NODE_ENV: 'test',
    },
    fc: {
        interruptAfterTimeLimit: 5_000,
        numRuns: env('CI') ? 100 : 50,
        ...(seed === undefined ? {} : { seed: Number.parseInt(seed, 10) }),
    },
});

// --- [EXPORT] ----------------------------------------------------------------

export { B as TEST_CONSTANTS };
