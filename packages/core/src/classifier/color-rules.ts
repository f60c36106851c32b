/**
 * Keyword-to-color rules
 *
 * Colors are ARGB hex codes (#AARRGGBB, alpha first) as read by mapping apps
 * that render waypoint markers from a GPX color extension.
 */

/**
 * A single keyword rule
 */
export interface ColorRule {
  /** Lowercase fragment searched for in the waypoint name */
  keyword: string;
  /** ARGB hex code, e.g. #FF249CF2 */
  color: string;
}

/**
 * Ordered rule table; the first matching keyword wins
 */
export type ColorRules = readonly ColorRule[];

/**
 * Named marker colors
 */
export const COLOR_PALETTE = {
  brown: '#FF804633',
  blue: '#FF249CF2',
  gray: '#FF737373',
  green: '#FF3C8C3C',
  yellow: '#FFFFC800',
  orange: '#FFFF9600',
  purple: '#FF9B24B2',
} as const;

export type PaletteColorName = keyof typeof COLOR_PALETTE;

/**
 * Default rules, in match order
 */
export const DEFAULT_COLOR_RULES: ColorRules = [
  { keyword: 'camp', color: COLOR_PALETTE.brown },
  { keyword: 'water', color: COLOR_PALETTE.blue },
  { keyword: 'creek', color: COLOR_PALETTE.blue },
  { keyword: 'stream', color: COLOR_PALETTE.blue },
  { keyword: 'pond', color: COLOR_PALETTE.blue },
  { keyword: 'pool', color: COLOR_PALETTE.blue },
  { keyword: 'lake', color: COLOR_PALETTE.blue },
  { keyword: 'fall', color: COLOR_PALETTE.blue },
  { keyword: 'trailhead', color: COLOR_PALETTE.gray },
  { keyword: 'parking', color: COLOR_PALETTE.gray },
  { keyword: 'viewpoint', color: COLOR_PALETTE.green },
  { keyword: 'peak', color: COLOR_PALETTE.green },
  { keyword: 'ranger', color: COLOR_PALETTE.yellow },
  { keyword: 'office', color: COLOR_PALETTE.yellow },
  { keyword: 'restroom', color: COLOR_PALETTE.yellow },
];

const ARGB_PATTERN = /^#[0-9A-Fa-f]{8}$/;

/**
 * Check that a value is a well-formed #AARRGGBB code
 */
export function isArgbColor(value: string): boolean {
  return ARGB_PATTERN.test(value);
}

/**
 * Palette name for a color code, if it is one of the named colors
 */
export function getPaletteName(color: string): PaletteColorName | undefined {
  const upper = color.toUpperCase();
  for (const [name, code] of Object.entries(COLOR_PALETTE)) {
    if (code === upper && isPaletteColorName(name)) {
      return name;
    }
  }
  return undefined;
}

function isPaletteColorName(name: string): name is PaletteColorName {
  return name in COLOR_PALETTE;
}
