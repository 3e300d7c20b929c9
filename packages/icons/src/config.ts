/**
 * Environment contract for the icon catalog: asset location, render defaults, logging.
 */
import { fileURLToPath } from 'node:url';
import { Config, type Effect, LogLevel } from 'effect';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    defaults: {
        assetsDir: fileURLToPath(new URL('../assets', import.meta.url)),
        cacheCapacity: 256,
        environment: 'development',
        logLevel: LogLevel.Info,
        size: 32,
    },
    keys: {
        assetsDir: 'ICONS_ASSETS_DIR',
        cacheCapacity: 'ICONS_CACHE_CAPACITY',
        environment: 'NODE_ENV',
        logLevel: 'LOG_LEVEL',
        size: 'ICONS_DEFAULT_SIZE',
    },
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const positiveInteger = (key: string, fallback: number): Config.Config<number> =>
    Config.integer(key).pipe(
        Config.withDefault(fallback),
        Config.validate({ message: `${key} must be a positive integer`, validation: (value) => value > 0 }),
    );

// --- [CONFIG] ----------------------------------------------------------------

const IconsConfig = Config.all({
    assetsDir: Config.string(B.keys.assetsDir).pipe(Config.withDefault(B.defaults.assetsDir)),
    cacheCapacity: positiveInteger(B.keys.cacheCapacity, B.defaults.cacheCapacity),
    defaultSize: positiveInteger(B.keys.size, B.defaults.size),
    environment: Config.string(B.keys.environment).pipe(Config.withDefault(B.defaults.environment)),
    logLevel: Config.logLevel(B.keys.logLevel).pipe(Config.withDefault(B.defaults.logLevel)),
});

// --- [TYPES] -----------------------------------------------------------------

type IconsSettings = Effect.Effect.Success<typeof IconsConfig>;

// --- [EXPORT] ----------------------------------------------------------------

export { B as CONFIG_TUNING, IconsConfig };
export type { IconsSettings };
