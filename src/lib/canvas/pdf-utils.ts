/**
 * Font and color mapping between report styles and pdf-lib.
 */

import { StandardFonts, rgb } from 'pdf-lib';
import type { Color } from 'pdf-lib';
import type { RGB } from '../style/color';

export type FontVariant = 'normal' | 'bold' | 'italic' | 'boldItalic';

const HELVETICA: Record<FontVariant, StandardFonts> = {
  normal: StandardFonts.Helvetica,
  bold: StandardFonts.HelveticaBold,
  italic: StandardFonts.HelveticaOblique,
  boldItalic: StandardFonts.HelveticaBoldOblique
};

const TIMES: Record<FontVariant, StandardFonts> = {
  normal: StandardFonts.TimesRoman,
  bold: StandardFonts.TimesRomanBold,
  italic: StandardFonts.TimesRomanItalic,
  boldItalic: StandardFonts.TimesRomanBoldItalic
};

const COURIER: Record<FontVariant, StandardFonts> = {
  normal: StandardFonts.Courier,
  bold: StandardFonts.CourierBold,
  italic: StandardFonts.CourierOblique,
  boldItalic: StandardFonts.CourierBoldOblique
};

/**
 * Map of font families to pdf-lib StandardFonts.
 */
const FONT_MAP: Record<string, Record<FontVariant, StandardFonts>> = {
  'arial': HELVETICA,
  'helvetica': HELVETICA,
  'sans-serif': HELVETICA,
  'times': TIMES,
  'times-roman': TIMES,
  'times new roman': TIMES,
  'serif': TIMES,
  'georgia': TIMES,
  'courier': COURIER,
  'courier new': COURIER,
  'monospace': COURIER
};

const STANDARD_FONT_NAMES: ReadonlySet<string> = new Set(Object.values(StandardFonts));

function isStandardFont(name: string): name is StandardFonts {
  return STANDARD_FONT_NAMES.has(name);
}

const VARIANT_SUFFIXES: Array<[RegExp, FontVariant]> = [
  [/[- ](bold ?(italic|oblique))$/i, 'boldItalic'],
  [/[- ]bold$/i, 'bold'],
  [/[- ](italic|oblique)$/i, 'italic'],
  [/[- ](regular|roman|normal)$/i, 'normal']
];

/**
 * Resolve a style's font name to one of the fourteen standard PDF fonts.
 *
 * Exact standard names ("Helvetica-Bold", "Times-Roman") are used as they
 * are. Otherwise a variant suffix ("Arial Bold", "Georgia-Italic") is split
 * off and the family looked up; unknown families fall back to Helvetica.
 */
export function getStandardFont(fontName: string): StandardFonts {
  const trimmed = fontName.trim();
  if (isStandardFont(trimmed)) {
    return trimmed;
  }

  let family = trimmed.toLowerCase();
  const exact = FONT_MAP[family];
  if (exact) {
    return exact.normal;
  }

  let variant: FontVariant = 'normal';
  for (const [pattern, suffixVariant] of VARIANT_SUFFIXES) {
    if (pattern.test(family)) {
      family = family.replace(pattern, '');
      variant = suffixVariant;
      break;
    }
  }

  const fontVariants = FONT_MAP[family] ?? HELVETICA;
  return fontVariants[variant];
}

export function toPdfColor(color: RGB): Color {
  return rgb(color.r, color.g, color.b);
}

/**
 * Filter text to WinAnsi-compatible characters.
 * Standard PDF fonts only support WinAnsi encoding; unsupported characters
 * become spaces so widths stay roughly the same.
 */
export function filterToWinAnsi(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 32 && code <= 126) {
      result += text[i];
    } else if (code >= 160 && code <= 255) {
      result += text[i];
    } else if (code === 0x2022 || code === 0x2013 || code === 0x2014 || code === 0x2018 ||
               code === 0x2019 || code === 0x201c || code === 0x201d || code === 0x2026 ||
               code === 0x20ac) {
      // Bullets, dashes, curly quotes, ellipsis and the euro sign are in WinAnsi
      result += text[i];
    } else if (code === 9) {
      result += '    ';
    } else if (code === 10 || code === 13 || code === 12) {
      continue;
    } else {
      result += ' ';
    }
  }
  return result;
}

/**
 * x of the left edge of text anchored at `x` with the given alignment.
 */
export function alignedX(x: number, textWidth: number, align: 'left' | 'center' | 'right'): number {
  switch (align) {
    case 'center':
      return x - textWidth / 2;
    case 'right':
      return x - textWidth;
    case 'left':
    default:
      return x;
  }
}
