/**
 * In-memory Effect logger: records every entry so tests can assert on messages and annotations.
 */
import { Layer, Logger, LogLevel } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type CapturedLog = {
    readonly annotations: Readonly<Record<string, unknown>>;
    readonly level: string;
    readonly message: string;
};
type LogCapture = {
    readonly layer: Layer.Layer<never>;
    readonly logs: CapturedLog[];
};

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const extractMessage = (message: unknown): string =>
    Array.isArray(message)
        ? message.map((part: unknown) => (typeof part === 'string' ? part : JSON.stringify(part))).join(' ')
        : typeof message === 'string'
          ? message
          : JSON.stringify(message);

// --- [ENTRY_POINT] -----------------------------------------------------------

/** Replace the default logger with a recorder; `level` sets the minimum captured level. */
const captureLogs = (level: LogLevel.LogLevel = LogLevel.All): LogCapture => {
    const logs: CapturedLog[] = [];
    const logger = Logger.make<unknown, void>(({ annotations, logLevel, message }) => {
        logs.push({
            annotations: Object.fromEntries(annotations),
            level: logLevel.label,
            message: extractMessage(message),
        });
    });
    return {
        layer: Layer.merge(Logger.replace(Logger.defaultLogger, logger), Logger.minimumLogLevel(level)),
        logs,
    };
};

// --- [EXPORT] ----------------------------------------------------------------

export { captureLogs };
export type { CapturedLog, LogCapture };
