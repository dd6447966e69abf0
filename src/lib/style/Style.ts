import { colorsEqual, rgbColor, toRGB } from './color';
import type { ColorInput, RGB } from './color';

export interface StyleInit {
  fontName: string;
  fontSize: number;
  color?: ColorInput;
}

/**
 * Immutable font, size and fill color bundle.
 *
 * Two styles are interchangeable when `equals` says so; identity carries
 * no meaning.
 */
export class Style {
  readonly fontName: string;
  readonly fontSize: number;
  readonly color: RGB;

  constructor(init: StyleInit) {
    if (!init.fontName.trim()) {
      throw new TypeError('Style fontName must not be empty');
    }
    if (!Number.isFinite(init.fontSize) || init.fontSize <= 0) {
      throw new RangeError(`Style fontSize must be positive, got ${init.fontSize}`);
    }
    this.fontName = init.fontName;
    this.fontSize = init.fontSize;
    this.color = init.color === undefined ? rgbColor(0, 0, 0) : toRGB(init.color);
    Object.freeze(this);
  }

  static from(init: StyleInit | Style): Style {
    return init instanceof Style ? init : new Style(init);
  }

  /**
   * Derive a new style with some properties replaced.
   */
  with(changes: Partial<StyleInit>): Style {
    return new Style({
      fontName: changes.fontName ?? this.fontName,
      fontSize: changes.fontSize ?? this.fontSize,
      color: changes.color ?? this.color
    });
  }

  equals(other: Style): boolean {
    return (
      this.fontName === other.fontName &&
      this.fontSize === other.fontSize &&
      colorsEqual(this.color, other.color)
    );
  }

  toData(): { fontName: string; fontSize: number; color: RGB } {
    return { fontName: this.fontName, fontSize: this.fontSize, color: { ...this.color } };
  }

  toString(): string {
    const { r, g, b } = this.color;
    return `${this.fontName} ${this.fontSize}pt rgb(${r}, ${g}, ${b})`;
  }
}
