/**
 * Validate icon schema decoding, builders and invariant reporting.
 */
import { FC_ARB } from '@castle-defense/test-utils/arbitraries';
import { it } from '@fast-check/vitest';
import { Effect, Option } from 'effect';
import { describe, expect } from 'vitest';
import {
    circle,
    decodeIcon,
    defineIcon,
    type Icon,
    isIcon,
    line,
    polygon,
    primaryFill,
    radialGradient,
    rect,
    regularPolygon,
    round,
} from '../src/schema.ts';
import { catalogIssues, iconIssues, isPainted } from '../src/validate.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const dot: Icon = Effect.runSync(
    defineIcon({ id: 'test-dot', label: 'Dot', shapes: [circle(50, 50, 20, { fill: '#336699' })] }),
);

// --- [TESTS] -----------------------------------------------------------------

describe('schema', () => {
    describe('builders', () => {
        it('rounds geometry to two decimals', () => {
            expect(circle(10.126, 20.004, 3.336)).toEqual({ _tag: 'Circle', cx: 10.13, cy: 20, r: 3.34 });
            expect(Object.is(round(-0.001), 0)).toBe(true);
            expect(polygon([[1.111, 2.222], [3.333, 4.444], [5.556, 6.666]]).points).toEqual([
                [1.11, 2.22],
                [3.33, 4.44],
                [5.56, 6.67],
            ]);
        });

        it('rounds the corner radius of a rect', () => {
            expect(rect(0.004, 0, 10, 10, { fill: '#000000', rx: 1.234 })).toEqual({
                _tag: 'Rect',
                fill: '#000000',
                height: 10,
                rx: 1.23,
                width: 10,
                x: 0,
                y: 0,
            });
            expect(rect(0, 0, 10, 10, { fill: '#000000' })).not.toHaveProperty('rx');
        });

        it('places regular polygon vertices around the center', () => {
            expect(regularPolygon(50, 50, 4, () => 10)).toEqual([
                [60, 50],
                [50, 60],
                [40, 50],
                [50, 40],
            ]);
        });

        it('fills the default canvas and display size', () => {
            expect(dot.viewBox).toEqual({ height: 100, minX: 0, minY: 0, width: 100 });
            expect(dot.size).toEqual({ height: 32, width: 32 });
            expect(dot.defs).toEqual([]);
            expect(primaryFill(dot)).toEqual(Option.some('#336699'));
        });
    });

    describe('decoding', () => {
        it.prop([FC_ARB.iconInput()])('accepts generated icons', (input) => {
            const icon = Effect.runSync(decodeIcon(input));
            expect(isIcon(icon)).toBe(true);
            expect(iconIssues(icon)).toEqual([]);
        });

        it('rejects an unpainted shape', () => {
            const error = Effect.runSync(
                Effect.flip(defineIcon({ id: 'blank', label: 'Blank', shapes: [circle(50, 50, 10, { fill: 'none' })] })),
            );
            expect(error.code).toBe('INVALID_ICON');
            expect(error.message).toContain('Circle #0 in blank has neither fill nor stroke');
        });

        it('rejects identifiers that are not slugs', () => {
            const exit = Effect.runSyncExit(defineIcon({ id: 'Force Core', label: 'Force Core', shapes: [circle(50, 50, 10, { fill: '#ff0000' })] }));
            expect(exit._tag).toBe('Failure');
        });

        it('rejects a zero-width viewBox', () => {
            const exit = Effect.runSyncExit(
                defineIcon({
                    id: 'flat',
                    label: 'Flat',
                    shapes: [circle(50, 50, 10, { fill: '#ff0000' })],
                    viewBox: { height: 100, minX: 0, minY: 0, width: 0 },
                }),
            );
            expect(exit._tag).toBe('Failure');
        });

        it('resolves gradient references within the icon', () => {
            const glow = radialGradient('glow', [{ color: '#ffffff', offset: 0 }]);
            const icon = Effect.runSync(
                defineIcon({ defs: [glow], id: 'glow', label: 'Glow', shapes: [circle(50, 50, 40, { fill: 'url(#glow)' })] }),
            );
            expect(icon.defs).toEqual([glow]);
            const exit = Effect.runSyncExit(
                defineIcon({ id: 'dangling', label: 'Dangling', shapes: [circle(50, 50, 40, { fill: 'url(#glow)' })] }),
            );
            expect(exit._tag).toBe('Failure');
        });
    });
});

describe('validate', () => {
    it('treats a stroke as paint', () => {
        expect(isPainted({ fill: 'none', stroke: '#000000' })).toBe(true);
        expect(isPainted({ fill: 'none' })).toBe(false);
        expect(isPainted({})).toBe(false);
    });

    it.prop([FC_ARB.shape(['glow'])])('paints every generated shape', (shape) => {
        expect(isPainted(shape)).toBe(true);
    });

    it('reports every broken invariant of an icon', () => {
        const glow = radialGradient('glow', [{ color: '#ffffff', offset: 0 }]);
        const broken: Icon = {
            ...dot,
            defs: [glow, glow],
            shapes: [rect(0, 0, 10, 10), line(0, 0, 10, 10, { stroke: 'url(#haze)' })],
            viewBox: { ...dot.viewBox, height: -1 },
        };
        expect(iconIssues(broken)).toEqual([
            { code: 'INVALID_VIEWBOX', iconId: 'test-dot', message: 'viewBox must have a positive width and height in test-dot' },
            { code: 'DUPLICATE_DEF', iconId: 'test-dot', message: 'gradient #glow is defined twice in test-dot' },
            { code: 'UNPAINTED_SHAPE', iconId: 'test-dot', message: 'Rect #0 in test-dot has neither fill nor stroke' },
            { code: 'UNRESOLVED_REFERENCE', iconId: 'test-dot', message: 'Line #1 in test-dot references missing #haze' },
        ]);
    });

    it('reports identifier collisions across a collection', () => {
        expect(catalogIssues([dot, dot])).toEqual([
            { code: 'DUPLICATE_ID', iconId: 'test-dot', message: 'icon identifier test-dot is not unique' },
        ]);
        expect(catalogIssues([dot])).toEqual([]);
    });
});
