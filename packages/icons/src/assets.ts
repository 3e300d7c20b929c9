/**
 * Load the shipped SVG icon documents from a directory through the platform file system.
 */
import { FileSystem, Path } from '@effect/platform';
import { Effect } from 'effect';
import { IconError } from './errors.ts';
import { parseIcon } from './markup.ts';
import type { Icon } from './schema.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({ extension: '.svg' } as const);

// --- [EFFECT_PIPELINE] -------------------------------------------------------

const readFailed = (target: string) => (cause: unknown): IconError<'Asset'> =>
    IconError.from('Asset', 'READ_FAILED', IconError.withIcon('Failed to read icon asset', target), cause);

/** Parse one asset; the file stem is the fallback identifier. */
const loadIconFile = (file: string): Effect.Effect<Icon, IconError<'Asset'> | IconError<'Markup'>, FileSystem.FileSystem | Path.Path> =>
    Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = yield* Path.Path;
        const markup = yield* fs.readFileString(file).pipe(Effect.mapError(readFailed(file)));
        const icon = yield* parseIcon(markup, { id: path.basename(file, path.extname(file)) });
        yield* Effect.logDebug('Loaded icon asset');
        return icon;
    }).pipe(Effect.annotateLogs({ file }));

/** Every `*.svg` in `directory`, sorted by file name. */
const loadIconDirectory = (
    directory: string,
): Effect.Effect<ReadonlyArray<Icon>, IconError<'Asset'> | IconError<'Markup'>, FileSystem.FileSystem | Path.Path> =>
    Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = yield* Path.Path;
        const entries = yield* fs.readDirectory(directory).pipe(Effect.mapError(readFailed(directory)));
        const files = entries
            .filter((entry) => path.extname(entry).toLowerCase() === B.extension)
            .sort()
            .map((entry) => path.join(directory, entry));
        yield* files.length === 0
            ? Effect.fail(IconError.from('Asset', 'NO_ASSETS', IconError.withIcon('No SVG assets found', directory)))
            : Effect.void;
        const icons = yield* Effect.forEach(files, loadIconFile);
        yield* Effect.logInfo('Icon assets loaded').pipe(Effect.annotateLogs({ count: icons.length, directory }));
        return icons;
    });

// --- [EXPORT] ----------------------------------------------------------------

export { B as ASSETS_TUNING, loadIconDirectory, loadIconFile };
