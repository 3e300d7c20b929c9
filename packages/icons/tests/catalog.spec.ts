/**
 * Validate the shipped catalog and the catalog service contract.
 */
import { TEST_CONSTANTS } from '@castle-defense/test-utils/constants';
import { captureLogs } from '@castle-defense/test-utils/logger';
import { it } from '@effect/vitest';
import { Effect, Layer, Option } from 'effect';
import { describe, expect } from 'vitest';
import { FALLBACK_ICON, IconCatalog, makeCatalog } from '../src/catalog.ts';
import { circle, defineIcon, type Icon, primaryFill, rect } from '../src/schema.ts';
import { iconIssues, isPainted } from '../src/validate.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const pebble: Icon = Effect.runSync(defineIcon({ id: 'pebble', label: 'Pebble', shapes: [circle(50, 50, 30, { fill: '#999999' })] }));
const ingot: Icon = Effect.runSync(defineIcon({ id: 'ingot', label: 'Ingot', shapes: [rect(20, 30, 60, 40, { fill: '#cccccc' })] }));

// --- [TESTS] -----------------------------------------------------------------

describe('shipped catalog', () => {
    it.effect('holds twelve uniquely identified icons', () =>
        Effect.gen(function* () {
            const catalog = yield* IconCatalog;
            const ids = catalog.ids();
            expect(catalog.size).toBe(TEST_CONSTANTS.assets.count);
            expect(new Set(ids).size).toBe(ids.length);
            expect([...ids].sort()).toEqual(TEST_CONSTANTS.assets.ids);
        }).pipe(Effect.provide(IconCatalog.Default)),
    );

    it.effect('has well-formed viewports and painted shapes everywhere', () =>
        Effect.gen(function* () {
            const catalog = yield* IconCatalog;
            for (const icon of catalog.list()) {
                expect(icon.viewBox).toEqual({ height: 100, minX: 0, minY: 0, width: 100 });
                expect(icon.shapes.every(isPainted)).toBe(true);
                expect(iconIssues(icon)).toEqual([]);
            }
        }).pipe(Effect.provide(IconCatalog.Default)),
    );

    it.effect('draws stone on a gray disc', () =>
        Effect.gen(function* () {
            const stone = yield* (yield* IconCatalog).get('stone');
            expect(primaryFill(stone)).toEqual(Option.some('#808080'));
            expect(stone.viewBox.width).toBe(100);
            expect(stone.viewBox.height).toBe(100);
        }).pipe(Effect.provide(IconCatalog.Default)),
    );

    it.effect('draws force-core as a white triangle on a red disc', () =>
        Effect.gen(function* () {
            const forceCore = yield* (yield* IconCatalog).get('force-core');
            const [background] = forceCore.shapes;
            expect(background._tag).toBe('Circle');
            expect(background.fill).toBe('#ff0000');
            const triangles = forceCore.shapes.filter((shape) => shape._tag === 'Polygon' && shape.points.length === 3);
            expect(triangles).toHaveLength(1);
            expect(triangles[0]?.fill).toBe('#ffffff');
        }).pipe(Effect.provide(IconCatalog.Default)),
    );
});

describe('IconCatalog', () => {
    it.effect('finds and gets icons by identifier', () =>
        Effect.gen(function* () {
            const catalog = yield* IconCatalog;
            expect(catalog.ids()).toEqual(['pebble', 'ingot']);
            expect(catalog.has('ingot')).toBe(true);
            expect(catalog.find('ingot')).toEqual(Option.some(ingot));
            expect(Option.isNone(catalog.find('granite'))).toBe(true);
            expect(yield* catalog.get('pebble')).toEqual(pebble);
            const error = yield* Effect.flip(catalog.get('granite'));
            expect(error.code).toBe('NOT_FOUND');
            expect(error.message).toBe('Icon not found (granite)');
        }).pipe(Effect.provide(IconCatalog.layer([pebble, ingot]))),
    );

    it.effect('resolves unknown identifiers to the fallback with a warning', () => {
        const capture = captureLogs();
        return Effect.gen(function* () {
            const catalog = yield* IconCatalog;
            expect(yield* catalog.resolve('pebble')).toEqual(pebble);
            const fallback = yield* catalog.resolve('granite');
            expect(fallback).toBe(FALLBACK_ICON);
            expect(primaryFill(fallback)).toEqual(Option.some('#ff00ff'));
            expect(catalog.has(fallback.id)).toBe(false);
            const warnings = capture.logs.filter((entry) => entry.level === 'WARN');
            expect(warnings).toEqual([
                { annotations: { iconId: 'granite' }, level: 'WARN', message: 'Unknown icon, using fallback' },
            ]);
        }).pipe(Effect.provide(Layer.merge(IconCatalog.layer([pebble, ingot]), capture.layer)));
    });

    it.effect('refuses an empty collection', () =>
        Effect.gen(function* () {
            expect((yield* Effect.flip(makeCatalog([]))).code).toBe('EMPTY_CATALOG');
        }),
    );

    it.effect('refuses duplicate identifiers', () =>
        Effect.gen(function* () {
            const error = yield* Effect.flip(makeCatalog([pebble, ingot, pebble]));
            expect(error.code).toBe('DUPLICATE_ID');
            expect(error.message).toBe('icon identifier pebble is not unique');
        }),
    );

    it.effect('refuses icons that break an invariant', () =>
        Effect.gen(function* () {
            const hollow: Icon = { ...ingot, shapes: [rect(20, 30, 60, 40)] };
            const error = yield* Effect.flip(makeCatalog([pebble, hollow]));
            expect(error.code).toBe('INVALID_CATALOG');
            expect(error.message).toBe('Rect #0 in ingot has neither fill nor stroke');
        }),
    );
});
