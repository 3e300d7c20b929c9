/**
 * Read-only icon catalog: lookup by identifier, fallback resolution, integrity gate.
 * Built once from decoded icons; `IconCatalog.Default` loads the configured asset directory.
 */
import { NodeContext } from '@effect/platform-node';
import { Context, Effect, Layer, Option } from 'effect';
import { loadIconDirectory } from './assets.ts';
import { IconsConfig } from './config.ts';
import { IconError } from './errors.ts';
import { circle, defineIcon, type Icon, type IconId, path } from './schema.ts';
import { catalogIssues } from './validate.ts';

// --- [TYPES] -----------------------------------------------------------------

type CatalogApi = {
    readonly fallback: Icon;
    readonly find: (id: string) => Option.Option<Icon>;
    readonly get: (id: string) => Effect.Effect<Icon, IconError<'Catalog'>>;
    readonly has: (id: string) => boolean;
    readonly ids: () => ReadonlyArray<IconId>;
    readonly list: () => ReadonlyArray<Icon>;
    readonly resolve: (id: string) => Effect.Effect<Icon>;
    readonly size: number;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    fallback: { base: '#ff00ff', glyph: '#ffffff', id: 'unknown', label: 'Unknown', rim: '#d700d7' },
} as const);
const FALLBACK_ICON: Icon = Effect.runSync(
    defineIcon({
        id: B.fallback.id,
        label: B.fallback.label,
        shapes: [
            circle(50, 50, 46, { fill: B.fallback.base, stroke: B.fallback.rim, strokeWidth: 4 }),
            path('M37 38A13 13 0 1 1 56 49.5C52 51.8 50 54 50 58.5V62', {
                fill: 'none',
                stroke: B.fallback.glyph,
                strokeLinecap: 'round',
                strokeWidth: 8,
            }),
            circle(50, 75, 5, { fill: B.fallback.glyph }),
        ],
    }),
);

// --- [EFFECT_PIPELINE] -------------------------------------------------------

/** Validate the collection, then index it; nothing is exposed when any invariant fails. */
const makeCatalog = (icons: ReadonlyArray<Icon>): Effect.Effect<CatalogApi, IconError<'Catalog'>> =>
    Effect.gen(function* () {
        yield* icons.length === 0 ? Effect.fail(IconError.from('Catalog', 'EMPTY_CATALOG')) : Effect.void;
        const issues = catalogIssues(icons);
        const duplicate = issues.find((issue) => issue.code === 'DUPLICATE_ID');
        yield* duplicate === undefined
            ? Effect.void
            : Effect.fail(IconError.from('Catalog', 'DUPLICATE_ID', duplicate.message, issues));
        yield* issues.length === 0
            ? Effect.void
            : Effect.fail(IconError.from('Catalog', 'INVALID_CATALOG', issues.map((issue) => issue.message).join('; '), issues));
        const index: ReadonlyMap<string, Icon> = new Map(icons.map((icon) => [icon.id, icon]));
        const find = (id: string): Option.Option<Icon> => Option.fromNullable(index.get(id));
        yield* Effect.logDebug('Icon catalog indexed').pipe(Effect.annotateLogs({ count: index.size }));
        return {
            fallback: FALLBACK_ICON,
            find,
            get: (id) =>
                Option.match(find(id), {
                    onNone: () => Effect.fail(IconError.from('Catalog', 'NOT_FOUND', IconError.withIcon('Icon not found', id))),
                    onSome: Effect.succeed,
                }),
            has: (id) => index.has(id),
            ids: () => icons.map((icon) => icon.id),
            list: () => [...icons],
            resolve: (id) =>
                Option.match(find(id), {
                    onNone: () =>
                        Effect.as(
                            Effect.logWarning('Unknown icon, using fallback').pipe(Effect.annotateLogs({ iconId: id })),
                            FALLBACK_ICON,
                        ),
                    onSome: Effect.succeed,
                }),
            size: index.size,
        } satisfies CatalogApi;
    });

// --- [SERVICES] --------------------------------------------------------------

class IconCatalog extends Context.Tag('icons/IconCatalog')<IconCatalog, CatalogApi>() {
    /** Catalog over icons already in memory. */
    static readonly layer = (icons: ReadonlyArray<Icon>): Layer.Layer<IconCatalog, IconError<'Catalog'>> =>
        Layer.effect(IconCatalog, makeCatalog(icons));
    /** Catalog over the configured asset directory, read with the Node file system. */
    static readonly Default = Layer.effect(
        IconCatalog,
        IconsConfig.pipe(
            Effect.flatMap((config) => loadIconDirectory(config.assetsDir)),
            Effect.flatMap(makeCatalog),
        ),
    ).pipe(Layer.provide(NodeContext.layer));
}

// --- [EXPORT] ----------------------------------------------------------------

export { B as CATALOG_TUNING, FALLBACK_ICON, IconCatalog, makeCatalog };
export type { CatalogApi };
