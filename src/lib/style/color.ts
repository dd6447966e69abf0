/**
 * Color in the PDF device RGB space, each channel 0-1.
 */
export interface RGB {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type ColorInput = RGB | string;

const NAMED_COLORS: Record<string, [number, number, number]> = {
  black: [0, 0, 0],
  white: [1, 1, 1],
  red: [1, 0, 0],
  green: [0, 0.5, 0],
  blue: [0, 0, 1],
  yellow: [1, 1, 0],
  cyan: [0, 1, 1],
  magenta: [1, 0, 1],
  gray: [0.5, 0.5, 0.5],
  grey: [0.5, 0.5, 0.5],
  orange: [1, 0.65, 0],
  purple: [0.5, 0, 0.5],
  brown: [0.65, 0.16, 0.16]
};

export function rgbColor(r: number, g: number, b: number): RGB {
  return Object.freeze({ r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) });
}

function clampChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Parse a CSS color string to RGB.
 * Supports hex (#RGB, #RRGGBB), rgb()/rgba() and a handful of named colors.
 * Returns null for anything it does not recognise.
 */
export function parseColor(cssColor: string): RGB | null {
  const color = cssColor.trim().toLowerCase();
  if (!color) return null;

  if (color.startsWith('#')) {
    const hex = color.slice(1);
    if (!/^[0-9a-f]+$/.test(hex)) return null;

    if (hex.length === 3) {
      return rgbColor(
        parseInt(hex[0] + hex[0], 16) / 255,
        parseInt(hex[1] + hex[1], 16) / 255,
        parseInt(hex[2] + hex[2], 16) / 255
      );
    }
    if (hex.length === 6 || hex.length === 8) {
      return rgbColor(
        parseInt(hex.slice(0, 2), 16) / 255,
        parseInt(hex.slice(2, 4), 16) / 255,
        parseInt(hex.slice(4, 6), 16) / 255
      );
    }
    return null;
  }

  const rgbMatch = color.match(/^rgba?\(\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)/);
  if (rgbMatch) {
    return rgbColor(
      parseInt(rgbMatch[1], 10) / 255,
      parseInt(rgbMatch[2], 10) / 255,
      parseInt(rgbMatch[3], 10) / 255
    );
  }

  const named = NAMED_COLORS[color];
  if (named) {
    return rgbColor(named[0], named[1], named[2]);
  }

  return null;
}

/**
 * Normalise a color input, throwing on strings that cannot be parsed.
 */
export function toRGB(input: ColorInput): RGB {
  if (typeof input !== 'string') {
    return rgbColor(input.r, input.g, input.b);
  }
  const parsed = parseColor(input);
  if (!parsed) {
    throw new TypeError(`Unrecognised color: "${input}"`);
  }
  return parsed;
}

export function colorsEqual(a: RGB, b: RGB): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}
