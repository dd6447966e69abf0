/**
 * Unit tests for Theme
 */
import { describe, it, expect } from 'vitest';
import { REQUIRED_ROLES, Theme } from '../../../lib/style/Theme';
import { Style } from '../../../lib/style/Style';

describe('Theme', () => {
  it('should define every required role by default', () => {
    const theme = Theme.defaults();

    expect(theme.missingRoles(REQUIRED_ROLES)).toEqual([]);
    expect(theme.roles).toEqual([
      'title', 'subtitle', 'heading', 'body', 'caption', 'footer', 'tableHeader', 'tableBody'
    ]);
  });

  it('should use the report palette', () => {
    const theme = Theme.defaults();

    expect(theme.get('body').equals(new Style({ fontName: 'Helvetica', fontSize: 10, color: '#333333' }))).toBe(true);
    expect(theme.get('footer').fontName).toBe('Helvetica-Oblique');
    expect(theme.get('footer').fontSize).toBe(8);
  });

  it('should throw a RangeError for unknown roles', () => {
    expect(() => Theme.defaults().get('sidebar')).toThrow(RangeError);
    expect(() => Theme.defaults().get('sidebar')).toThrow('Theme has no "sidebar" role');
  });

  describe('withOverrides()', () => {
    it('should replace and add roles over the defaults', () => {
      const theme = Theme.withOverrides({
        body: { fontName: 'Times-Roman', fontSize: 11 },
        note: { fontName: 'Courier', fontSize: 8, color: 'gray' }
      });

      expect(theme.get('body').fontName).toBe('Times-Roman');
      expect(theme.get('note').color).toEqual({ r: 0.5, g: 0.5, b: 0.5 });
      expect(theme.get('title').equals(Theme.defaults().get('title'))).toBe(true);
    });
  });

  describe('extend()', () => {
    it('should not change the theme it extends', () => {
      const base = new Theme({ body: { fontName: 'Helvetica', fontSize: 10 } });
      const extended = base.extend({ caption: { fontName: 'Helvetica', fontSize: 8 } });

      expect(base.has('caption')).toBe(false);
      expect(extended.has('caption')).toBe(true);
      expect(extended.get('body')).toBe(base.get('body'));
    });
  });

  it('should list roles missing from a custom theme', () => {
    const theme = new Theme({ body: { fontName: 'Helvetica', fontSize: 10 } });

    expect(theme.missingRoles(['body', 'footer', 'caption'])).toEqual(['footer', 'caption']);
  });

  it('should serialize every role', () => {
    const data = new Theme({ body: { fontName: 'Helvetica', fontSize: 10, color: 'black' } }).toData();

    expect(data).toEqual({ body: { fontName: 'Helvetica', fontSize: 10, color: { r: 0, g: 0, b: 0 } } });
  });
});
