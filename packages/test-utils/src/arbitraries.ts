/**
 * Arbitraries: fast-check generators for icon documents whose geometry prints exactly.
 */
import fc from 'fast-check';

// --- [CONSTANTS] ------------------------------------------------------------

const B = Object.freeze({
    charSets: {
        label: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 &',
        slug: 'abcdefghijklmnopqrstuvwxyz0123456789',
    },
    coordinate: { max: 20_000, min: -20_000 },
    defs: { max: 2 },
    length: { max: 20_000, min: 1 },
    linecaps: ['butt', 'round', 'square'] as const,
    points: { max: 8 },
    precision: 100,
    shapes: { max: 6 },
    size: { max: 512, min: 1 },
    slug: { maxLength: 8, maxWords: 3 },
    stops: { max: 3 },
} as const);

// --- [PURE_FUNCTIONS] -------------------------------------------------------

const charsToArb = (chars: string): fc.Arbitrary<string> => fc.constantFrom(...chars.split(''));
const hundredths = (bounds: { readonly max: number; readonly min: number }): fc.Arbitrary<number> =>
    fc.integer(bounds).map((value) => value / B.precision);
const fcCoordinate = (): fc.Arbitrary<number> => hundredths(B.coordinate);
const fcLength = (): fc.Arbitrary<number> => hundredths(B.length);
const fcUnit = (): fc.Arbitrary<number> => hundredths({ max: B.precision, min: 0 });
const fcHexColor = (): fc.Arbitrary<string> =>
    fc.integer({ max: 0xffffff, min: 0 }).map((value) => `#${value.toString(16).padStart(6, '0')}`);
const fcSlug = (): fc.Arbitrary<string> =>
    fc
        .array(fc.string({ maxLength: B.slug.maxLength, minLength: 1, unit: charsToArb(B.charSets.slug) }), {
            maxLength: B.slug.maxWords,
            minLength: 1,
        })
        .map((words) => words.join('-'));
const fcLabel = (): fc.Arbitrary<string> =>
    fc
        .string({ maxLength: 24, minLength: 1, unit: charsToArb(B.charSets.label) })
        .filter((label) => label.trim() === label && label !== '');
const fcPoint = (): fc.Arbitrary<readonly [number, number]> => fc.tuple(fcCoordinate(), fcCoordinate());
/** Style that always paints through `fill`; other keys are absent or set. */
const fcStyle = (fill: fc.Arbitrary<string> = fcHexColor()) =>
    fc.record(
        {
            fill,
            opacity: fcUnit(),
            stroke: fc.oneof(fcHexColor(), fc.constant('none')),
            strokeLinecap: fc.constantFrom(...B.linecaps),
            strokeWidth: fcLength(),
        },
        { requiredKeys: ['fill'] },
    );
/** Painted shape whose fill is a hex color or one of `refs` as `url(#…)`. */
const fcShape = (refs: ReadonlyArray<string> = []) =>
    fc.oneof(
        fc.record({ _tag: fc.constant('Circle' as const), cx: fcCoordinate(), cy: fcCoordinate(), r: fcLength() }),
        fc.record({ _tag: fc.constant('Ellipse' as const), cx: fcCoordinate(), cy: fcCoordinate(), rx: fcLength(), ry: fcLength() }),
        fc.record(
            { _tag: fc.constant('Rect' as const), height: fcLength(), rx: fcUnit(), width: fcLength(), x: fcCoordinate(), y: fcCoordinate() },
            { requiredKeys: ['_tag', 'height', 'width', 'x', 'y'] },
        ),
        fc.record({ _tag: fc.constant('Line' as const), x1: fcCoordinate(), x2: fcCoordinate(), y1: fcCoordinate(), y2: fcCoordinate() }),
        fc.record({ _tag: fc.constant('Polygon' as const), points: fc.array(fcPoint(), { maxLength: B.points.max, minLength: 3 }) }),
        fc.record({ _tag: fc.constant('Polyline' as const), points: fc.array(fcPoint(), { maxLength: B.points.max, minLength: 2 }) }),
        fc.record({
            _tag: fc.constant('Path' as const),
            d: fc.tuple(fcPoint(), fcPoint()).map(([[x1, y1], [x2, y2]]) => `M${x1} ${y1}L${x2} ${y2}`),
        }),
    ).chain((geometry) =>
        fcStyle(refs.length === 0 ? fcHexColor() : fc.oneof(fcHexColor(), fc.constantFrom(...refs).map((ref) => `url(#${ref})`))).map(
            (style) => ({ ...geometry, ...style }),
        ),
    );
const fcStop = () => fc.record({ color: fcHexColor(), offset: fcUnit(), opacity: fcUnit() }, { requiredKeys: ['color', 'offset'] });
const fcStops = () => fc.tuple(fcStop(), fc.array(fcStop(), { maxLength: B.stops.max - 1 })).map(([head, tail]) => [head, ...tail]);
const fcGradient = (id: string) =>
    fc.oneof(
        fc.record({ _tag: fc.constant('LinearGradient' as const), id: fc.constant(id), stops: fcStops(), x1: fcUnit(), x2: fcUnit(), y1: fcUnit(), y2: fcUnit() }),
        fc.record({ _tag: fc.constant('RadialGradient' as const), cx: fcUnit(), cy: fcUnit(), id: fc.constant(id), r: fcLength(), stops: fcStops() }),
    );
/** Encoded icon with unique gradient ids; shapes may paint with any of them. */
const fcIconInput = () =>
    fc
        .integer({ max: B.defs.max, min: 0 })
        .map((count) => Array.from({ length: count }, (_, index) => `grad-${index}`))
        .chain((refs) =>
            fc.record({
                defs: fc.tuple(...refs.map((ref) => fcGradient(ref))),
                id: fcSlug(),
                label: fcLabel(),
                shapes: fc.tuple(fcShape(refs), fc.array(fcShape(refs), { maxLength: B.shapes.max - 1 })).map(([head, tail]) => [head, ...tail]),
                size: fc.record({ height: fc.integer(B.size), width: fc.integer(B.size) }),
                viewBox: fc.record({ height: fcLength(), minX: fcCoordinate(), minY: fcCoordinate(), width: fcLength() }),
            }),
        );

// --- [ENTRY_POINT] ----------------------------------------------------------

const Arbitraries = Object.freeze({
    hexColor: fcHexColor,
    iconInput: fcIconInput,
    shape: fcShape,
});

// --- [EXPORT] ----------------------------------------------------------------

export { Arbitraries as FC_ARB };
