/**
 * Define icon primitives, gradients and icon documents with runtime validation.
 * Effect Schema structs; decoding an Icon also enforces the catalog invariants.
 */
import { Effect, Option, pipe, Schema as S } from 'effect';
import { IconError } from './errors.ts';
import { iconIssues } from './validate.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    canvas: { height: 100, minX: 0, minY: 0, width: 100 },
    linecaps: ['butt', 'round', 'square'] as const,
    patterns: {
        defId: /^[a-zA-Z_][a-zA-Z0-9_-]*$/,
        hexColor: /^#[0-9a-f]{6}$/i,
        iconId: /^[a-z0-9]+(?:-[a-z0-9]+)*$/,
        reference: /^url\(#([a-zA-Z_][a-zA-Z0-9_-]*)\)$/,
    },
    points: { polygon: 3, polyline: 2 },
    precision: 100,
    size: { height: 32, width: 32 },
} as const);

// --- [SCHEMA] ----------------------------------------------------------------

const CoordinateSchema = S.Finite;
const LengthSchema = pipe(S.Finite, S.positive());
const UnitSchema = pipe(S.Finite, S.between(0, 1));
const IconIdSchema = pipe(S.String, S.pattern(B.patterns.iconId), S.brand('IconId'));
const DefIdSchema = pipe(S.String, S.pattern(B.patterns.defId));
const HexColorSchema = pipe(S.String, S.pattern(B.patterns.hexColor));
const ReferenceSchema = pipe(S.String, S.pattern(B.patterns.reference));
const PaintSchema = S.Union(S.Literal('none'), HexColorSchema, ReferenceSchema);
const PointSchema = S.Tuple(CoordinateSchema, CoordinateSchema);
const ViewBoxSchema = S.Struct({
    height: LengthSchema,
    minX: CoordinateSchema,
    minY: CoordinateSchema,
    width: LengthSchema,
});
const DisplaySizeSchema = S.Struct({
    height: pipe(S.Int, S.positive()),
    width: pipe(S.Int, S.positive()),
});
const styleFields = {
    fill: S.optional(PaintSchema),
    opacity: S.optional(UnitSchema),
    stroke: S.optional(PaintSchema),
    strokeLinecap: S.optional(S.Literal(...B.linecaps)),
    strokeWidth: S.optional(LengthSchema),
} as const;
const StyleSchema = S.Struct(styleFields);
const CircleSchema = S.TaggedStruct('Circle', { cx: CoordinateSchema, cy: CoordinateSchema, r: LengthSchema, ...styleFields });
const EllipseSchema = S.TaggedStruct('Ellipse', {
    cx: CoordinateSchema,
    cy: CoordinateSchema,
    rx: LengthSchema,
    ry: LengthSchema,
    ...styleFields,
});
const RectSchema = S.TaggedStruct('Rect', {
    height: LengthSchema,
    rx: S.optional(pipe(S.Finite, S.nonNegative())),
    width: LengthSchema,
    x: CoordinateSchema,
    y: CoordinateSchema,
    ...styleFields,
});
const LineSchema = S.TaggedStruct('Line', {
    x1: CoordinateSchema,
    x2: CoordinateSchema,
    y1: CoordinateSchema,
    y2: CoordinateSchema,
    ...styleFields,
});
const PolygonSchema = S.TaggedStruct('Polygon', { points: pipe(S.Array(PointSchema), S.minItems(B.points.polygon)), ...styleFields });
const PolylineSchema = S.TaggedStruct('Polyline', { points: pipe(S.Array(PointSchema), S.minItems(B.points.polyline)), ...styleFields });
const PathSchema = S.TaggedStruct('Path', { d: S.NonEmptyTrimmedString, ...styleFields });
const ShapeSchema = S.Union(CircleSchema, EllipseSchema, RectSchema, LineSchema, PolygonSchema, PolylineSchema, PathSchema);
const StopSchema = S.Struct({
    color: HexColorSchema,
    offset: UnitSchema,
    opacity: S.optional(UnitSchema),
});
const LinearGradientSchema = S.TaggedStruct('LinearGradient', {
    id: DefIdSchema,
    stops: S.NonEmptyArray(StopSchema),
    x1: CoordinateSchema,
    x2: CoordinateSchema,
    y1: CoordinateSchema,
    y2: CoordinateSchema,
});
const RadialGradientSchema = S.TaggedStruct('RadialGradient', {
    cx: CoordinateSchema,
    cy: CoordinateSchema,
    id: DefIdSchema,
    r: LengthSchema,
    stops: S.NonEmptyArray(StopSchema),
});
const GradientSchema = S.Union(LinearGradientSchema, RadialGradientSchema);
const IconStructSchema = S.Struct({
    defs: S.Array(GradientSchema),
    id: IconIdSchema,
    label: S.NonEmptyTrimmedString,
    shapes: S.NonEmptyArray(ShapeSchema),
    size: DisplaySizeSchema,
    viewBox: ViewBoxSchema,
});
const IconSchema = pipe(
    IconStructSchema,
    S.filter((icon) => {
        const issues = iconIssues(icon);
        return issues.length === 0 ? undefined : issues.map((issue) => issue.message).join('; ');
    }),
);

// --- [TYPES] -----------------------------------------------------------------

type IconId = S.Schema.Type<typeof IconIdSchema>;
type Paint = S.Schema.Type<typeof PaintSchema>;
type Point = S.Schema.Type<typeof PointSchema>;
type ViewBox = S.Schema.Type<typeof ViewBoxSchema>;
type DisplaySize = S.Schema.Type<typeof DisplaySizeSchema>;
type Style = S.Schema.Type<typeof StyleSchema>;
type Circle = S.Schema.Type<typeof CircleSchema>;
type Ellipse = S.Schema.Type<typeof EllipseSchema>;
type Rect = S.Schema.Type<typeof RectSchema>;
type Line = S.Schema.Type<typeof LineSchema>;
type Polygon = S.Schema.Type<typeof PolygonSchema>;
type Polyline = S.Schema.Type<typeof PolylineSchema>;
type Path = S.Schema.Type<typeof PathSchema>;
type Shape = S.Schema.Type<typeof ShapeSchema>;
type ShapeTag = Shape['_tag'];
type Stop = S.Schema.Type<typeof StopSchema>;
type LinearGradient = S.Schema.Type<typeof LinearGradientSchema>;
type RadialGradient = S.Schema.Type<typeof RadialGradientSchema>;
type Gradient = S.Schema.Type<typeof GradientSchema>;
type Icon = S.Schema.Type<typeof IconStructSchema>;
type IconInput = S.Schema.Encoded<typeof IconStructSchema>;

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Round to two decimals; authored geometry stays exact through `String(n)`. */
const round = (value: number): number => Math.round(value * B.precision) / B.precision || 0;
const isIcon = S.is(IconSchema);
/** Fill of the background (first) shape. */
const primaryFill = (icon: Icon): Option.Option<Paint> => Option.fromNullable(icon.shapes[0].fill);

// --- [BUILDERS] --------------------------------------------------------------

const circle = (cx: number, cy: number, r: number, style: Style = {}): Circle => ({
    _tag: 'Circle',
    cx: round(cx),
    cy: round(cy),
    r: round(r),
    ...style,
});
const ellipse = (cx: number, cy: number, rx: number, ry: number, style: Style = {}): Ellipse => ({
    _tag: 'Ellipse',
    cx: round(cx),
    cy: round(cy),
    rx: round(rx),
    ry: round(ry),
    ...style,
});
const rect = (x: number, y: number, width: number, height: number, style: Style & { readonly rx?: number } = {}): Rect => ({
    _tag: 'Rect',
    height: round(height),
    width: round(width),
    x: round(x),
    y: round(y),
    ...style,
    ...(style.rx === undefined ? {} : { rx: round(style.rx) }),
});
const line = (x1: number, y1: number, x2: number, y2: number, style: Style = {}): Line => ({
    _tag: 'Line',
    x1: round(x1),
    x2: round(x2),
    y1: round(y1),
    y2: round(y2),
    ...style,
});
const roundPoints = (points: ReadonlyArray<Point>): ReadonlyArray<Point> => points.map(([x, y]): Point => [round(x), round(y)]);
const polygon = (points: ReadonlyArray<Point>, style: Style = {}): Polygon => ({ _tag: 'Polygon', points: roundPoints(points), ...style });
const polyline = (points: ReadonlyArray<Point>, style: Style = {}): Polyline => ({ _tag: 'Polyline', points: roundPoints(points), ...style });
const path = (d: string, style: Style = {}): Path => ({ _tag: 'Path', d: d.trim(), ...style });
/** Vertices of an n-gon around (cx, cy); `radiusAt` varies the radius per vertex. */
const regularPolygon = (
    cx: number,
    cy: number,
    sides: number,
    radiusAt: (index: number) => number,
    rotation = 0,
): ReadonlyArray<Point> =>
    Array.from({ length: sides }, (_, index) => {
        const angle = rotation + (2 * Math.PI * index) / sides;
        const radius = radiusAt(index);
        const vertex: Point = [round(cx + radius * Math.cos(angle)), round(cy + radius * Math.sin(angle))];
        return vertex;
    });
const linearGradient = (
    id: string,
    stops: readonly [Stop, ...Stop[]],
    vector: { readonly x1: number; readonly x2: number; readonly y1: number; readonly y2: number } = { x1: 0, x2: 1, y1: 0, y2: 0 },
): LinearGradient => ({ _tag: 'LinearGradient', id, stops, ...vector });
const radialGradient = (
    id: string,
    stops: readonly [Stop, ...Stop[]],
    geometry: { readonly cx: number; readonly cy: number; readonly r: number } = { cx: 0.5, cy: 0.5, r: 0.5 },
): RadialGradient => ({ _tag: 'RadialGradient', id, stops, ...geometry });

// --- [EFFECT_PIPELINE] -------------------------------------------------------

const decodeIcon = (input: unknown): Effect.Effect<Icon, IconError<'Markup'>> =>
    S.decodeUnknown(IconSchema)(input).pipe(
        Effect.mapError((error) => IconError.from('Markup', 'INVALID_ICON', error.message, error)),
    );
/** Build an icon from authored parts on the default 100×100 canvas at 32×32. */
const defineIcon = (
    input: Omit<IconInput, 'defs' | 'size' | 'viewBox'> & Partial<Pick<IconInput, 'defs' | 'size' | 'viewBox'>>,
): Effect.Effect<Icon, IconError<'Markup'>> =>
    decodeIcon({
        defs: [],
        size: { ...B.size },
        viewBox: { ...B.canvas },
        ...input,
    });

// --- [EXPORT] ----------------------------------------------------------------

export {
    B as SCHEMA_TUNING,
    CircleSchema,
    circle,
    DisplaySizeSchema,
    decodeIcon,
    defineIcon,
    EllipseSchema,
    ellipse,
    GradientSchema,
    HexColorSchema,
    IconIdSchema,
    IconSchema,
    isIcon,
    LineSchema,
    LinearGradientSchema,
    line,
    linearGradient,
    PaintSchema,
    PathSchema,
    PolygonSchema,
    PolylineSchema,
    path,
    polygon,
    polyline,
    primaryFill,
    RadialGradientSchema,
    RectSchema,
    radialGradient,
    rect,
    regularPolygon,
    round,
    ShapeSchema,
    StyleSchema,
    ViewBoxSchema,
};
export type {
    Circle,
    DisplaySize,
    Ellipse,
    Gradient,
    Icon,
    IconId,
    IconInput,
    Line,
    LinearGradient,
    Paint,
    Path,
    Point,
    Polygon,
    Polyline,
    RadialGradient,
    Rect,
    Shape,
    ShapeTag,
    Stop,
    Style,
    ViewBox,
};
