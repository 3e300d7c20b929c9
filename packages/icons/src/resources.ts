/**
 * Map game resource names to icon identifiers, display colors, categories and cost text.
 */
import { Option, pipe } from 'effect';
import { shiftColor } from './palette.ts';

// --- [TYPES] -----------------------------------------------------------------

type ResourceCategory = keyof typeof B.categories;
type CategoryFilter = 'all' | ResourceCategory;
type Amounts = Readonly<Record<string, number>>;
type DescribeOptions = { readonly hasResource?: boolean; readonly showName?: boolean };
type ResourceDisplay = { readonly iconId: string; readonly text: string; readonly textColor: string };

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    affordability: { affordable: '#64ff64', unaffordable: '#ff6464' },
    categories: {
        food: ['Grain', 'Fruit', 'Meat', 'Dairy'],
        normal: ['Stone', 'Iron', 'Copper', 'Thorium'],
        special: [
            'Monster Coins',
            'Force Core',
            'Spirit Core',
            'Magic Core',
            'Void Core',
            'Unstoppable Force',
            'Serene Spirit',
            'Multitudation Vortex',
        ],
    },
    colors: {
        Copper: '#b87333',
        'Force Core': '#ff0000',
        Iron: '#b0c4de',
        'Magic Core': '#8a2be2',
        'Monster Coins': '#d4af37',
        'Multitudation Vortex': '#9664ff',
        'Serene Spirit': '#32cd32',
        'Spirit Core': '#00ced1',
        Stone: '#808080',
        Thorium: '#4b0082',
        'Unstoppable Force': '#ff4500',
        'Void Core': '#191919',
    },
    defaultColor: '#c8c8c8',
    free: 'Free',
    iconIds: { 'Monster Coins': 'monster-coin' },
    labelBrighten: 40,
    order: [
        'Monster Coins',
        'Stone',
        'Iron',
        'Copper',
        'Thorium',
        'Force Core',
        'Spirit Core',
        'Magic Core',
        'Void Core',
        'Unstoppable Force',
        'Serene Spirit',
        'Multitudation Vortex',
    ],
    separator: ', ',
} as const);
const colors: Readonly<Record<string, string>> = B.colors;
const iconIds: Readonly<Record<string, string>> = B.iconIds;
const order: ReadonlyArray<string> = B.order;
const categories: ReadonlyArray<readonly [ResourceCategory, ReadonlyArray<string>]> = [
    ['normal', B.categories.normal],
    ['special', B.categories.special],
    ['food', B.categories.food],
];

// --- [PURE_FUNCTIONS] --------------------------------------------------------

/** Fixed icon id, else the name lowercased with spaces as `-`. */
const iconIdFor = (name: string): string => iconIds[name] ?? name.toLowerCase().replaceAll(' ', '-');
const resourceColor = (name: string): string => colors[name] ?? B.defaultColor;
/** Resource color brightened for text on dark panels. */
const labelColor = (name: string): string => {
    const base = resourceColor(name);
    return pipe(
        shiftColor(base, B.labelBrighten),
        Option.getOrElse(() => base),
    );
};
const categoryOf = (name: string): Option.Option<ResourceCategory> =>
    Option.fromNullable(categories.find(([, names]) => names.includes(name))?.[0]);
/** Unknown filters yield an empty record. */
const filterByCategory = (amounts: Amounts, filter: CategoryFilter | (string & {})): Amounts =>
    filter === 'all'
        ? { ...amounts }
        : Object.fromEntries(
              Object.entries(amounts).filter(([name]) => Option.exists(categoryOf(name), (category) => category === filter)),
          );
/** Known resources in display order, then the rest in insertion order. */
const sortResources = (amounts: Amounts): ReadonlyArray<readonly [string, number]> => {
    const entries = Object.entries(amounts);
    return [
        ...order.flatMap((name) => entries.filter(([entry]) => entry === name)),
        ...entries.filter(([name]) => !order.includes(name)),
    ];
};
const formatCost = (cost: Amounts, separator: string = B.separator): string => {
    const entries = sortResources(cost);
    return entries.length === 0 ? B.free : entries.map(([name, amount]) => `${name}: ${amount}`).join(separator);
};
const describeResource = (name: string, amount: number, options: DescribeOptions = {}): ResourceDisplay => ({
    iconId: iconIdFor(name),
    text: (options.showName ?? true) ? `${name}: ${amount}` : `${amount}`,
    textColor: (options.hasResource ?? true) ? B.affordability.affordable : B.affordability.unaffordable,
});

// --- [EXPORT] ----------------------------------------------------------------

export {
    B as RESOURCES_TUNING,
    categoryOf,
    describeResource,
    filterByCategory,
    formatCost,
    iconIdFor,
    labelColor,
    resourceColor,
    sortResources,
};
export type { Amounts, CategoryFilter, DescribeOptions, ResourceCategory, ResourceDisplay };
