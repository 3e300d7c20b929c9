/**
 * Validate byte-clamped hex color conversion and shifting.
 */
import { FC_ARB } from '@castle-defense/test-utils/arbitraries';
import { it } from '@fast-check/vitest';
import { Option } from 'effect';
import { describe, expect } from 'vitest';
import { hexToRgb, isHexColor, rgbToHex, shiftColor } from '../src/palette.ts';

// --- [TESTS] -----------------------------------------------------------------

describe('palette', () => {
    it('parses hex colors into channels', () => {
        expect(hexToRgb('#808080')).toEqual(Option.some([128, 128, 128]));
        expect(hexToRgb('#B87333')).toEqual(Option.some([184, 115, 51]));
        expect(Option.isNone(hexToRgb('#80808'))).toBe(true);
        expect(Option.isNone(hexToRgb('gray'))).toBe(true);
        expect(Option.isNone(hexToRgb('#fff'))).toBe(true);
    });

    it('clamps and rounds channels when formatting', () => {
        expect(rgbToHex([300, -5, 127.6])).toBe('#ff0080');
        expect(rgbToHex([0, 0, 0])).toBe('#000000');
    });

    it('shifts every channel by the same delta', () => {
        expect(shiftColor('#808080', -40)).toEqual(Option.some('#585858'));
        expect(shiftColor('#ff0000', -40)).toEqual(Option.some('#d70000'));
        expect(shiftColor('#c8c8c8', 40)).toEqual(Option.some('#f0f0f0'));
        expect(shiftColor('#f0f0f0', 40)).toEqual(Option.some('#ffffff'));
        expect(Option.isNone(shiftColor('red', 40))).toBe(true);
    });

    it.prop([FC_ARB.hexColor()])('formats parsed colors back to the same hex', (hex) => {
        expect(isHexColor(hex)).toBe(true);
        expect(Option.map(hexToRgb(hex), rgbToHex)).toEqual(Option.some(hex));
    });
});
