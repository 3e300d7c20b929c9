/**
 * Validate resource display helpers: icon ids, colors, categories, ordering and cost text.
 */
import { Option } from 'effect';
import { describe, expect, it } from 'vitest';
import {
    type CategoryFilter,
    categoryOf,
    describeResource,
    filterByCategory,
    formatCost,
    iconIdFor,
    labelColor,
    resourceColor,
    sortResources,
} from '../src/resources.ts';

// --- [CONSTANTS] -------------------------------------------------------------

const stockpile = { 'Force Core': 1, Grain: 2, Stone: 5 };

// --- [TESTS] -----------------------------------------------------------------

describe('resources', () => {
    it('maps resource names to icon ids', () => {
        expect(iconIdFor('Monster Coins')).toBe('monster-coin');
        expect(iconIdFor('Force Core')).toBe('force-core');
        expect(iconIdFor('Multitudation Vortex')).toBe('multitudation-vortex');
        expect(iconIdFor('Ancient Relic')).toBe('ancient-relic');
    });

    it('resolves base and label colors', () => {
        expect(resourceColor('Stone')).toBe('#808080');
        expect(resourceColor('Gold')).toBe('#c8c8c8');
        expect(labelColor('Stone')).toBe('#a8a8a8');
        expect(labelColor('Force Core')).toBe('#ff2828');
        expect(labelColor('Gold')).toBe('#f0f0f0');
    });

    it('categorizes resources', () => {
        expect(categoryOf('Iron')).toEqual(Option.some('normal'));
        expect(categoryOf('Void Core')).toEqual(Option.some('special'));
        expect(categoryOf('Grain')).toEqual(Option.some('food'));
        expect(Option.isNone(categoryOf('Gold'))).toBe(true);
    });

    it('filters amounts by category', () => {
        expect(filterByCategory(stockpile, 'all')).toEqual(stockpile);
        expect(filterByCategory(stockpile, 'normal')).toEqual({ Stone: 5 });
        expect(filterByCategory(stockpile, 'special')).toEqual({ 'Force Core': 1 });
        expect(filterByCategory(stockpile, 'food')).toEqual({ Grain: 2 });
        expect(filterByCategory(stockpile, 'treasure')).toEqual({});
    });

    it('splits amounts across the named categories', () => {
        const filters: ReadonlyArray<CategoryFilter> = ['normal', 'special', 'food'];
        const merged = Object.assign({}, ...filters.map((filter) => filterByCategory(stockpile, filter)));
        expect(merged).toEqual(filterByCategory(stockpile, 'all'));
    });

    it('orders known resources first and keeps the rest in insertion order', () => {
        expect(sortResources({ Grain: 2, Iron: 3, 'Monster Coins': 1, Dairy: 4 })).toEqual([
            ['Monster Coins', 1],
            ['Iron', 3],
            ['Grain', 2],
            ['Dairy', 4],
        ]);
    });

    it('formats costs', () => {
        expect(formatCost({})).toBe('Free');
        expect(formatCost({ Iron: 10, Stone: 5 })).toBe('Stone: 5, Iron: 10');
        expect(formatCost({ Grain: 1, Thorium: 2 }, ' | ')).toBe('Thorium: 2 | Grain: 1');
    });

    it('describes a resource next to its icon', () => {
        expect(describeResource('Stone', 20)).toEqual({ iconId: 'stone', text: 'Stone: 20', textColor: '#64ff64' });
        expect(describeResource('Monster Coins', 3, { hasResource: false, showName: false })).toEqual({
            iconId: 'monster-coin',
            text: '3',
            textColor: '#ff6464',
        });
    });
});
