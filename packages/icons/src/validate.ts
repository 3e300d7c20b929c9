/**
 * Report broken icon invariants: viewport, paint, gradient references, identifier uniqueness.
 */
import type { Icon, Shape, Style } from './schema.ts';

// --- [TYPES] -----------------------------------------------------------------

type IssueCode = keyof typeof B.codes;
type Issue = {
    readonly code: IssueCode;
    readonly iconId: string;
    readonly message: string;
};

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    codes: {
        DUPLICATE_DEF: 'DUPLICATE_DEF',
        DUPLICATE_ID: 'DUPLICATE_ID',
        INVALID_VIEWBOX: 'INVALID_VIEWBOX',
        UNPAINTED_SHAPE: 'UNPAINTED_SHAPE',
        UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
    },
    patterns: { reference: /^url\(#([^)]+)\)$/ },
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const issue = (code: IssueCode, iconId: string, message: string): Issue => ({ code, iconId, message });
const isPainted = (style: Style): boolean =>
    (style.fill !== undefined && style.fill !== 'none') || (style.stroke !== undefined && style.stroke !== 'none');
const references = (style: Style): ReadonlyArray<string> =>
    [style.fill, style.stroke].flatMap((paint) => {
        const id = paint === undefined ? undefined : B.patterns.reference.exec(paint)?.[1];
        return id === undefined ? [] : [id];
    });
const duplicates = (values: ReadonlyArray<string>): ReadonlyArray<string> => [
    ...new Set(values.filter((value, index) => values.indexOf(value) !== index)),
];
const viewBoxIssues = (icon: Icon): ReadonlyArray<Issue> =>
    [icon.viewBox.width, icon.viewBox.height].every((extent) => Number.isFinite(extent) && extent > 0)
        ? []
        : [issue('INVALID_VIEWBOX', icon.id, `viewBox must have a positive width and height in ${icon.id}`)];
const shapeIssues = (icon: Icon, definitions: ReadonlySet<string>) => (shape: Shape, index: number): ReadonlyArray<Issue> => [
    ...(isPainted(shape) ? [] : [issue('UNPAINTED_SHAPE', icon.id, `${shape._tag} #${index} in ${icon.id} has neither fill nor stroke`)]),
    ...references(shape)
        .filter((id) => !definitions.has(id))
        .map((id) => issue('UNRESOLVED_REFERENCE', icon.id, `${shape._tag} #${index} in ${icon.id} references missing #${id}`)),
];

/** Every broken invariant of a single icon; empty when valid. */
const iconIssues = (icon: Icon): ReadonlyArray<Issue> => {
    const ids = icon.defs.map((def) => def.id);
    return [
        ...viewBoxIssues(icon),
        ...duplicates(ids).map((id) => issue('DUPLICATE_DEF', icon.id, `gradient #${id} is defined twice in ${icon.id}`)),
        ...icon.shapes.flatMap(shapeIssues(icon, new Set(ids))),
    ];
};
/** Icon issues plus identifier collisions across the collection. */
const catalogIssues = (icons: ReadonlyArray<Icon>): ReadonlyArray<Issue> => [
    ...duplicates(icons.map((icon) => icon.id)).map((id) => issue('DUPLICATE_ID', id, `icon identifier ${id} is not unique`)),
    ...icons.flatMap(iconIssues),
];

// --- [EXPORT] ----------------------------------------------------------------

export { B as VALIDATE_TUNING, catalogIssues, iconIssues, isPainted };
export type { Issue, IssueCode };
