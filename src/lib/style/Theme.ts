import { Style } from './Style';
import type { StyleInit } from './Style';

/**
 * Roles the layout engine itself draws with. Every theme has them.
 */
export const REQUIRED_ROLES = ['title', 'subtitle', 'heading', 'body', 'caption', 'footer', 'tableHeader', 'tableBody'] as const;

export type ThemeRole = typeof REQUIRED_ROLES[number];

export type ThemeInit = Record<string, StyleInit | Style>;

/**
 * Read-only mapping from role name to Style.
 */
export class Theme {
  private readonly styles: ReadonlyMap<string, Style>;

  constructor(styles: ThemeInit) {
    const entries = Object.entries(styles).map(([role, init]): [string, Style] => [role, Style.from(init)]);
    this.styles = new Map(entries);
  }

  /**
   * Palette of the analysis reports this engine lays out: dark grey body
   * text, red titles, blue headings, italic grey footer.
   */
  static defaults(): Theme {
    return new Theme({
      title: { fontName: 'Helvetica-Bold', fontSize: 18, color: '#E63946' },
      subtitle: { fontName: 'Helvetica', fontSize: 16, color: '#457B9D' },
      heading: { fontName: 'Helvetica-Bold', fontSize: 16, color: '#457B9D' },
      body: { fontName: 'Helvetica', fontSize: 10, color: '#333333' },
      caption: { fontName: 'Helvetica-Oblique', fontSize: 9, color: '#666666' },
      footer: { fontName: 'Helvetica-Oblique', fontSize: 8, color: '#666666' },
      tableHeader: { fontName: 'Helvetica-Bold', fontSize: 10, color: '#FFFFFF' },
      tableBody: { fontName: 'Helvetica', fontSize: 9, color: '#333333' }
    });
  }

  /**
   * The default theme with the given roles added or replaced.
   */
  static withOverrides(overrides: ThemeInit = {}): Theme {
    return Theme.defaults().extend(overrides);
  }

  extend(overrides: ThemeInit): Theme {
    const merged: ThemeInit = {};
    for (const [role, style] of this.styles) {
      merged[role] = style;
    }
    return new Theme({ ...merged, ...overrides });
  }

  has(role: string): boolean {
    return this.styles.has(role);
  }

  /**
   * @throws RangeError when the role is not defined
   */
  get(role: string): Style {
    const style = this.styles.get(role);
    if (!style) {
      throw new RangeError(`Theme has no "${role}" role. Defined roles: ${this.roles.join(', ')}`);
    }
    return style;
  }

  get roles(): string[] {
    return Array.from(this.styles.keys());
  }

  toData(): Record<string, ReturnType<Style['toData']>> {
    const data: Record<string, ReturnType<Style['toData']>> = {};
    for (const [role, style] of this.styles) {
      data[role] = style.toData();
    }
    return data;
  }

  missingRoles(roles: readonly string[]): string[] {
    return roles.filter(role => !this.styles.has(role));
  }
}
