/**
 * Swap the default logger per environment and apply the configured minimum level.
 */
import { Effect, Layer, Logger } from 'effect';
import { IconsConfig, type IconsSettings } from './config.ts';

// --- [LAYERS] ----------------------------------------------------------------

const make = (settings: Pick<IconsSettings, 'environment' | 'logLevel'>): Layer.Layer<never> =>
    Layer.merge(
        Logger.replace(
            Logger.defaultLogger,
            settings.environment === 'production' ? Logger.jsonLogger : Logger.prettyLogger({ colors: 'auto', mode: 'auto' }),
        ),
        Logger.minimumLogLevel(settings.logLevel),
    );
const layer = Layer.unwrapEffect(Effect.map(IconsConfig, make));

// --- [ENTRY_POINT] -----------------------------------------------------------

const IconsLogger = { layer, make } as const;

// --- [EXPORT] ----------------------------------------------------------------

export { IconsLogger };
