/**
 * Serialize icons to canonical SVG documents and load them back through DOMPurify.
 * Sanitized DOM walk over a closed element whitelist; the schema decides validity.
 */
import { Array as A, Effect, Option, pipe, Record as R } from 'effect';
import DOMPurify from 'isomorphic-dompurify';
import { IconError } from './errors.ts';
import { decodeIcon, type Gradient, type Icon, type Shape, type Stop, type ViewBox } from './schema.ts';

// --- [TYPES] -----------------------------------------------------------------

type FieldKind = 'number' | 'points' | 'string';
type Field = readonly [key: string, attribute: string, kind: FieldKind];
type ElementSpec = { readonly element: string; readonly fields: ReadonlyArray<Field> };
type ParseOptions = { readonly id?: string | undefined };
type Attributes = ReadonlyMap<string, string>;
type Reader = (name: string, value: string) => Effect.Effect<unknown, IconError<'Markup'>>;

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    gradients: {
        LinearGradient: {
            element: 'linearGradient',
            fields: [
                ['id', 'id', 'string'],
                ['x1', 'x1', 'number'],
                ['y1', 'y1', 'number'],
                ['x2', 'x2', 'number'],
                ['y2', 'y2', 'number'],
            ],
        },
        RadialGradient: {
            element: 'radialGradient',
            fields: [
                ['id', 'id', 'string'],
                ['cx', 'cx', 'number'],
                ['cy', 'cy', 'number'],
                ['r', 'r', 'number'],
            ],
        },
    },
    indent: '  ',
    metadata: ['desc', 'title'],
    namespace: 'http://www.w3.org/2000/svg',
    patterns: {
        number: /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i,
        separator: /[\s,]+/,
    },
    purify: {
        ADD_ATTR: ['data-icon'],
        SANITIZE_DOM: false,
        USE_PROFILES: { svg: true },
    },
    shapes: {
        Circle: {
            element: 'circle',
            fields: [
                ['cx', 'cx', 'number'],
                ['cy', 'cy', 'number'],
                ['r', 'r', 'number'],
            ],
        },
        Ellipse: {
            element: 'ellipse',
            fields: [
                ['cx', 'cx', 'number'],
                ['cy', 'cy', 'number'],
                ['rx', 'rx', 'number'],
                ['ry', 'ry', 'number'],
            ],
        },
        Line: {
            element: 'line',
            fields: [
                ['x1', 'x1', 'number'],
                ['y1', 'y1', 'number'],
                ['x2', 'x2', 'number'],
                ['y2', 'y2', 'number'],
            ],
        },
        Path: { element: 'path', fields: [['d', 'd', 'string']] },
        Polygon: { element: 'polygon', fields: [['points', 'points', 'points']] },
        Polyline: { element: 'polyline', fields: [['points', 'points', 'points']] },
        Rect: {
            element: 'rect',
            fields: [
                ['x', 'x', 'number'],
                ['y', 'y', 'number'],
                ['width', 'width', 'number'],
                ['height', 'height', 'number'],
                ['rx', 'rx', 'number'],
            ],
        },
    },
    stop: [
        ['offset', 'offset', 'number'],
        ['color', 'stop-color', 'string'],
        ['opacity', 'stop-opacity', 'number'],
    ],
    style: [
        ['fill', 'fill', 'string'],
        ['stroke', 'stroke', 'string'],
        ['strokeWidth', 'stroke-width', 'number'],
        ['strokeLinecap', 'stroke-linecap', 'string'],
        ['opacity', 'opacity', 'number'],
    ],
} as const);
const shapeSpecs: Readonly<Record<Shape['_tag'], ElementSpec>> = B.shapes;
const gradientSpecs: Readonly<Record<Gradient['_tag'], ElementSpec>> = B.gradients;
const styleFields: ReadonlyArray<Field> = B.style;
const stopFields: ReadonlyArray<Field> = B.stop;
const byElement = <T extends string>(specs: Readonly<Record<T, ElementSpec>>): ReadonlyMap<string, readonly [T, ElementSpec]> =>
    new Map(R.toEntries(specs).map(([tag, spec]) => [spec.element.toLowerCase(), [tag, spec] as const]));
const shapeElements = byElement(shapeSpecs);
const gradientElements = byElement(gradientSpecs);

// --- [SERIALIZE] -------------------------------------------------------------

const escapeXml = (value: string): string =>
    value.replaceAll('&', '&amp;').replaceAll('"', '&quot;').replaceAll('<', '&lt;').replaceAll('>', '&gt;');
const formatValue = (value: unknown): string =>
    Array.isArray(value)
        ? value.map((point) => (Array.isArray(point) ? point.map(String).join(',') : String(point))).join(' ')
        : String(value);
const attributes = (record: Readonly<Record<string, unknown>>, fields: ReadonlyArray<Field>): ReadonlyArray<string> =>
    fields.flatMap(([key, attribute]) =>
        record[key] === undefined ? [] : [`${attribute}="${escapeXml(formatValue(record[key]))}"`],
    );
const element = (name: string, parts: ReadonlyArray<string>, depth: number): string =>
    `${B.indent.repeat(depth)}<${[name, ...parts].join(' ')}/>`;
const shapeLine = (shape: Shape): string => {
    const spec = shapeSpecs[shape._tag];
    return element(spec.element, [...attributes(shape, spec.fields), ...attributes(shape, styleFields)], 1);
};
const stopLine = (stop: Stop): string => element('stop', attributes(stop, stopFields), 3);
const gradientLines = (gradient: Gradient): ReadonlyArray<string> => {
    const spec = gradientSpecs[gradient._tag];
    const open = `${B.indent.repeat(2)}<${[spec.element, ...attributes(gradient, spec.fields)].join(' ')}>`;
    return [open, ...gradient.stops.map(stopLine), `${B.indent.repeat(2)}</${spec.element}>`];
};
/** Canonical SVG document for an icon; ends with a newline. */
const serializeIcon = (icon: Icon): string => {
    const root = [
        `xmlns="${B.namespace}"`,
        `data-icon="${escapeXml(icon.id)}"`,
        `aria-label="${escapeXml(icon.label)}"`,
        `viewBox="${[icon.viewBox.minX, icon.viewBox.minY, icon.viewBox.width, icon.viewBox.height].join(' ')}"`,
        `width="${icon.size.width}"`,
        `height="${icon.size.height}"`,
    ];
    const defs = icon.defs.length === 0 ? [] : [`${B.indent}<defs>`, ...icon.defs.flatMap(gradientLines), `${B.indent}</defs>`];
    return `${[`<svg ${root.join(' ')}>`, ...defs, ...icon.shapes.map(shapeLine), '</svg>'].join('\n')}\n`;
};

// --- [PARSE] -----------------------------------------------------------------

const invalidAttribute = (name: string, value: string): IconError<'Markup'> =>
    IconError.from('Markup', 'INVALID_ATTRIBUTE', `Invalid ${name}="${value}"`);
const attributesOf = (node: Element): Attributes =>
    new Map(Array.from(node.attributes, (attribute) => [attribute.name.toLowerCase(), attribute.value] as const));
const tagOf = (node: Element): string => node.localName.toLowerCase();
const parseNumber = (name: string, value: string): Effect.Effect<number, IconError<'Markup'>> =>
    B.patterns.number.test(value.trim()) ? Effect.succeed(Number(value.trim())) : Effect.fail(invalidAttribute(name, value));
const parseNumbers = (name: string, value: string): Effect.Effect<ReadonlyArray<number>, IconError<'Markup'>> =>
    Effect.forEach(value.trim().split(B.patterns.separator).filter((token) => token !== ''), (token) => parseNumber(name, token));
const parsePoints = (name: string, value: string): Effect.Effect<ReadonlyArray<readonly [number, number]>, IconError<'Markup'>> =>
    Effect.flatMap(parseNumbers(name, value), (numbers) =>
        numbers.length % 2 === 0
            ? Effect.succeed(
                  Array.from({ length: numbers.length / 2 }, (_, index) => [numbers[2 * index] ?? 0, numbers[2 * index + 1] ?? 0] as const),
              )
            : Effect.fail(invalidAttribute(name, value)),
    );
const readers: Readonly<Record<FieldKind, Reader>> = {
    number: parseNumber,
    points: parsePoints,
    string: (_, value) => Effect.succeed(value.trim()),
};
const readFields = (attrs: Attributes, fields: ReadonlyArray<Field>): Effect.Effect<Record<string, unknown>, IconError<'Markup'>> =>
    Effect.map(
        Effect.forEach(
            fields,
            ([key, attribute, kind]): Effect.Effect<Option.Option<readonly [string, unknown]>, IconError<'Markup'>> =>
                Option.match(Option.fromNullable(attrs.get(attribute)), {
                    onNone: () => Effect.succeed(Option.none()),
                    onSome: (value) => Effect.map(readers[kind](attribute, value), (parsed) => Option.some([key, parsed] as const)),
                }),
        ),
        (entries) => Object.fromEntries(A.getSomes(entries)),
    );
const unsupported = (node: Element): IconError<'Markup'> =>
    IconError.from('Markup', 'UNSUPPORTED_ELEMENT', `Unsupported SVG element <${node.localName}>`);
const parseShape = (node: Element): Effect.Effect<Record<string, unknown>, IconError<'Markup'>> =>
    Option.match(Option.fromNullable(shapeElements.get(tagOf(node))), {
        onNone: () => Effect.fail(unsupported(node)),
        onSome: ([tag, spec]) =>
            Effect.gen(function* () {
                const attrs = attributesOf(node);
                const geometry = yield* readFields(attrs, spec.fields);
                const style = yield* readFields(attrs, styleFields);
                return { _tag: tag, ...geometry, ...style };
            }),
    });
const parseGradient = (node: Element): Effect.Effect<Record<string, unknown>, IconError<'Markup'>> =>
    Option.match(Option.fromNullable(gradientElements.get(tagOf(node))), {
        onNone: () => Effect.fail(unsupported(node)),
        onSome: ([tag, spec]) =>
            Effect.gen(function* () {
                const fields = yield* readFields(attributesOf(node), spec.fields);
                const stops = yield* Effect.forEach(Array.from(node.children), (child) =>
                    tagOf(child) === 'stop' ? readFields(attributesOf(child), stopFields) : Effect.fail(unsupported(child)),
                );
                return { _tag: tag, ...fields, stops };
            }),
    });
const parseViewBox = (value: string | undefined): Effect.Effect<ViewBox, IconError<'Markup'>> =>
    value === undefined
        ? Effect.fail(IconError.from('Markup', 'MALFORMED', 'Markup has no viewBox'))
        : Effect.flatMap(parseNumbers('viewBox', value), (numbers) => {
              const [minX, minY, width, height] = numbers;
              return numbers.length === 4 && minX !== undefined && minY !== undefined && width !== undefined && height !== undefined
                  ? Effect.succeed({ height, minX, minY, width })
                  : Effect.fail(invalidAttribute('viewBox', value));
          });
/** `monster-coin` → `Monster Coin`. */
const labelFromId = (id: string): string =>
    id
        .split('-')
        .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
        .join(' ');
const nonBlank = (value: string | null | undefined): Option.Option<string> =>
    Option.filter(Option.fromNullable(value?.trim()), (text) => text !== '');
const resolveId = (declared: string | undefined, fallback: string | undefined): Effect.Effect<string, IconError<'Markup'>> =>
    Option.match(Option.fromNullable(declared ?? fallback), {
        onNone: () => Effect.fail(IconError.from('Markup', 'MISSING_ID')),
        onSome: (id) =>
            declared !== undefined && fallback !== undefined && declared !== fallback
                ? Effect.fail(IconError.from('Markup', 'ID_MISMATCH', `data-icon="${declared}" does not match "${fallback}"`))
                : Effect.succeed(id),
    });
const sanitizedRoot = (markup: string): Effect.Effect<Element, IconError<'Markup'>> =>
    pipe(
        Effect.sync(() => DOMPurify.sanitize(markup, { ...B.purify, ADD_ATTR: [...B.purify.ADD_ATTR], RETURN_DOM_FRAGMENT: true })),
        Effect.flatMap((fragment) =>
            Option.match(
                Option.filter(Option.fromNullable(fragment.firstElementChild), (node) => tagOf(node) === 'svg'),
                {
                    onNone: () => Effect.fail(IconError.from('Markup', 'MALFORMED')),
                    onSome: Effect.succeed,
                },
            ),
        ),
    );

/** Load one icon from SVG markup; `options.id` is the fallback identifier (e.g. the file name). */
const parseIcon = (markup: string, options: ParseOptions = {}): Effect.Effect<Icon, IconError<'Markup'>> =>
    Effect.gen(function* () {
        const root = yield* sanitizedRoot(markup);
        const attrs = attributesOf(root);
        const id = yield* resolveId(attrs.get('data-icon'), options.id);
        const viewBox = yield* parseViewBox(attrs.get('viewbox'));
        const children = Array.from(root.children);
        const title = nonBlank(children.find((child) => tagOf(child) === 'title')?.textContent);
        const defs = yield* Effect.forEach(
            children.filter((child) => tagOf(child) === 'defs').flatMap((child) => Array.from(child.children)),
            parseGradient,
        );
        const shapes = yield* Effect.forEach(
            children.filter((child) => tagOf(child) !== 'defs' && !B.metadata.some((tag) => tag === tagOf(child))),
            parseShape,
        );
        const width = yield* parseNumber('width', attrs.get('width') ?? String(Math.round(viewBox.width)));
        const height = yield* parseNumber('height', attrs.get('height') ?? String(Math.round(viewBox.height)));
        yield* Effect.logDebug('Parsed icon markup').pipe(Effect.annotateLogs({ iconId: id, shapes: shapes.length }));
        return yield* decodeIcon({
            defs,
            id,
            label: pipe(
                nonBlank(attrs.get('aria-label')),
                Option.orElse(() => title),
                Option.getOrElse(() => labelFromId(id)),
            ),
            shapes,
            size: { height, width },
            viewBox,
        });
    });

// --- [EXPORT] ----------------------------------------------------------------

export { B as MARKUP_TUNING, labelFromId, parseIcon, serializeIcon };
export type { ParseOptions };
