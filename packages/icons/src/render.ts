/**
 * Render catalog icons at a display size, scope gradient ids for inlining, and emit data URIs.
 * `IconRenderer` memoizes markup per `<id>_<w>x<h>` over the catalog.
 */
import { Cache, Data, Duration, Effect, Schema as S } from 'effect';
import { IconCatalog } from './catalog.ts';
import { IconsConfig } from './config.ts';
import { IconError } from './errors.ts';
import { serializeIcon } from './markup.ts';
import { type DisplaySize, DisplaySizeSchema, type Icon, type Paint, type Shape } from './schema.ts';

// --- [TYPES] -----------------------------------------------------------------

type SizeInput = number | DisplaySize;
type RenderOptions = {
    readonly label?: string | undefined;
    readonly scope?: string | undefined;
    readonly size?: SizeInput | undefined;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    dataUri: 'data:image/svg+xml;charset=utf-8,',
    hex: { length: 8, multiplier: 31, radix: 16 },
    patterns: { reference: /^url\(#([^)]+)\)$/, scope: /^[A-Za-z0-9_-]+$/ },
} as const);

// --- [CLASSES] ---------------------------------------------------------------

class RenderKey extends Data.Class<{ readonly height: number; readonly id: string; readonly width: number }> {
    get label(): string { return `${this.id}_${this.width}x${this.height}`; }
}

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Deterministic 8-hex-digit scope for a seed string. */
const deriveScope = (seed: string): string => {
    const modulo = B.hex.radix ** B.hex.length;
    const hash = Array.from(seed).reduce<number>((acc, char) => (acc * B.hex.multiplier + (char.codePointAt(0) ?? 0)) % modulo, 0);
    return hash.toString(B.hex.radix).padStart(B.hex.length, '0');
};
const toDataUri = (markup: string): string => `${B.dataUri}${encodeURIComponent(markup)}`;
const scopePaint = (paint: Paint | undefined, scope: string): Paint | undefined =>
    paint?.replace(B.patterns.reference, (_, id: string) => `url(#${id}_${scope})`);
const scopeShape = (scope: string) => (shape: Shape): Shape => ({
    ...shape,
    fill: scopePaint(shape.fill, scope),
    stroke: scopePaint(shape.stroke, scope),
});
/** Suffix every gradient id and `url(#…)` reference with `_<scope>`. */
const scopeIcon = (icon: Icon, scope: string): Icon => ({
    ...icon,
    defs: icon.defs.map((def) => ({ ...def, id: `${def.id}_${scope}` })),
    shapes: [scopeShape(scope)(icon.shapes[0]), ...icon.shapes.slice(1).map(scopeShape(scope))],
});

// --- [EFFECT_PIPELINE] -------------------------------------------------------

const decodeSize = (size: SizeInput): Effect.Effect<DisplaySize, IconError<'Render'>> =>
    S.decodeUnknown(DisplaySizeSchema)(typeof size === 'number' ? { height: size, width: size } : size).pipe(
        Effect.mapError((error) => IconError.from('Render', 'INVALID_SIZE', error.message, error)),
    );
const checkScope = (scope: string | undefined): Effect.Effect<void, IconError<'Render'>> =>
    scope === undefined || B.patterns.scope.test(scope)
        ? Effect.void
        : Effect.fail(IconError.from('Render', 'INVALID_SCOPE', IconError.withIcon('Invalid render scope', scope)));
/** Serialized markup at the requested size; the viewBox stays untouched so the canvas scales. */
const renderIcon = (icon: Icon, options: RenderOptions = {}): Effect.Effect<string, IconError<'Render'>> =>
    Effect.gen(function* () {
        const size = options.size === undefined ? icon.size : yield* decodeSize(options.size);
        yield* checkScope(options.scope);
        const scoped = options.scope === undefined ? icon : scopeIcon(icon, options.scope);
        return serializeIcon({ ...scoped, label: options.label ?? icon.label, size });
    });

// --- [SERVICES] --------------------------------------------------------------

class IconRenderer extends Effect.Service<IconRenderer>()('icons/IconRenderer', {
    effect: Effect.gen(function* () {
        const catalog = yield* IconCatalog;
        const config = yield* IconsConfig;
        const cache = yield* Cache.make({
            capacity: config.cacheCapacity,
            lookup: (key: RenderKey) =>
                catalog.resolve(key.id).pipe(
                    Effect.flatMap((icon) => renderIcon(icon, { size: { height: key.height, width: key.width } })),
                    Effect.tap(() => Effect.logDebug('Rendered icon').pipe(Effect.annotateLogs({ cacheKey: key.label }))),
                ),
            timeToLive: Duration.infinity,
        });
        const keyOf = (id: string, size: SizeInput = config.defaultSize): Effect.Effect<RenderKey, IconError<'Render'>> =>
            Effect.map(decodeSize(size), (decoded) => new RenderKey({ ...decoded, id }));
        const render = (id: string, size?: SizeInput): Effect.Effect<string, IconError<'Render'>> =>
            Effect.flatMap(keyOf(id, size), (key) => cache.get(key));
        return {
            cacheKey: (id: string, size?: SizeInput) => Effect.map(keyOf(id, size), (key) => key.label),
            dataUri: (id: string, size?: SizeInput) => Effect.map(render(id, size), toDataUri),
            render,
            stats: cache.cacheStats,
        };
    }),
}) {}

// --- [EXPORT] ----------------------------------------------------------------

export { B as RENDER_TUNING, deriveScope, IconRenderer, RenderKey, renderIcon, scopeIcon, toDataUri };
export type { RenderOptions, SizeInput };
