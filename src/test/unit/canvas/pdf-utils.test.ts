/**
 * Unit tests for pdf-lib helpers
 */
import { describe, it, expect } from 'vitest';
import { StandardFonts, rgb } from 'pdf-lib';
import { alignedX, filterToWinAnsi, getStandardFont, toPdfColor } from '../../../lib/canvas/pdf-utils';

describe('getStandardFont()', () => {
  it('should keep standard font names', () => {
    expect(getStandardFont('Helvetica-Bold')).toBe(StandardFonts.HelveticaBold);
    expect(getStandardFont('Times-Roman')).toBe(StandardFonts.TimesRoman);
    expect(getStandardFont('Courier-Oblique')).toBe(StandardFonts.CourierOblique);
  });

  it('should map families to their standard font', () => {
    expect(getStandardFont('Arial')).toBe(StandardFonts.Helvetica);
    expect(getStandardFont('serif')).toBe(StandardFonts.TimesRoman);
    expect(getStandardFont('Times New Roman')).toBe(StandardFonts.TimesRoman);
    expect(getStandardFont('monospace')).toBe(StandardFonts.Courier);
  });

  it('should map variant suffixes', () => {
    expect(getStandardFont('Arial Bold')).toBe(StandardFonts.HelveticaBold);
    expect(getStandardFont('Georgia-Italic')).toBe(StandardFonts.TimesRomanItalic);
    expect(getStandardFont('Courier New Bold Italic')).toBe(StandardFonts.CourierBoldOblique);
    expect(getStandardFont('Times New Roman Bold')).toBe(StandardFonts.TimesRomanBold);
  });

  it('should fall back to Helvetica', () => {
    expect(getStandardFont('Comic Sans')).toBe(StandardFonts.Helvetica);
    expect(getStandardFont('Comic Sans Bold')).toBe(StandardFonts.HelveticaBold);
  });
});

describe('filterToWinAnsi()', () => {
  it('should keep printable ASCII and Latin-1', () => {
    expect(filterToWinAnsi('Café 10%')).toBe('Café 10%');
  });

  it('should keep bullets, dashes and curly quotes', () => {
    expect(filterToWinAnsi('• a – b — “c”')).toBe('• a – b — “c”');
  });

  it('should expand tabs and drop line breaks', () => {
    expect(filterToWinAnsi('a\tb\r\nc')).toBe('a    bc');
  });

  it('should replace other characters with spaces', () => {
    expect(filterToWinAnsi('x≥y')).toBe('x y');
  });
});

describe('alignedX()', () => {
  it('should offset by the text width for the alignment', () => {
    expect(alignedX(100, 40, 'left')).toBe(100);
    expect(alignedX(100, 40, 'center')).toBe(80);
    expect(alignedX(100, 40, 'right')).toBe(60);
  });
});

describe('toPdfColor()', () => {
  it('should convert to a pdf-lib RGB color', () => {
    expect(toPdfColor({ r: 1, g: 0.5, b: 0 })).toEqual(rgb(1, 0.5, 0));
  });
});
