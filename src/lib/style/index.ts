export { Style } from './Style';
export type { StyleInit } from './Style';
export { Theme, REQUIRED_ROLES } from './Theme';
export type { ThemeInit, ThemeRole } from './Theme';
export { parseColor, toRGB, rgbColor, colorsEqual } from './color';
export type { RGB, ColorInput } from './color';
