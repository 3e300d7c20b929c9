/**
 * Shift sRGB hex colors by whole channel steps, clamped to the byte range.
 */
import Color from 'colorjs.io';
import { Option, pipe } from 'effect';

// --- [TYPES] -----------------------------------------------------------------

type Rgb = readonly [red: number, green: number, blue: number];

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    channel: { max: 255, min: 0 },
    format: { collapse: false, format: 'hex' },
    patterns: { hex: /^#[0-9a-f]{6}$/i },
    space: 'srgb',
} as const);

// --- [PURE_FUNCTIONS] --------------------------------------------------------

const clampChannel = (value: number): number => Math.min(B.channel.max, Math.max(B.channel.min, Math.round(value)));
const isHexColor = (value: string): boolean => B.patterns.hex.test(value);
/** `#rrggbb` only; named and short forms are rejected. */
const hexToRgb = (hex: string): Option.Option<Rgb> =>
    pipe(
        Option.liftPredicate(hex, isHexColor),
        Option.flatMap(Option.liftThrowable((value: string) => new Color(value).to(B.space).coords)),
        Option.map(([r, g, b]): Rgb => [clampChannel(r * B.channel.max), clampChannel(g * B.channel.max), clampChannel(b * B.channel.max)]),
    );
const rgbToHex = (rgb: Rgb): string =>
    new Color(
        B.space,
        [clampChannel(rgb[0]) / B.channel.max, clampChannel(rgb[1]) / B.channel.max, clampChannel(rgb[2]) / B.channel.max],
    ).toString(B.format);
/** Add `delta` to every channel; negative deltas darken. */
const shiftColor = (hex: string, delta: number): Option.Option<string> =>
    pipe(
        hexToRgb(hex),
        Option.map(([r, g, b]) => rgbToHex([r + delta, g + delta, b + delta])),
    );

// --- [EXPORT] ----------------------------------------------------------------

export { B as PALETTE_TUNING, hexToRgb, isHexColor, rgbToHex, shiftColor };
export type { Rgb };
