/**
 * Terminal color palettes
 *
 * The game only speaks in four semantic text colors; a palette decides
 * which ANSI escape code each of them becomes.
 */

/**
 * Semantic text colors used by the game display
 */
export type TextColor = 'default' | 'yellow' | 'red' | 'green';

/**
 * Available palette identifiers
 */
export const PALETTE_NAMES = ['classic', 'bright', 'mono'] as const;

export type PaletteName = (typeof PALETTE_NAMES)[number];

/**
 * Palette definition: display name plus one escape code per color
 */
export interface Palette {
  /** Display name */
  name: string;
  codes: Record<TextColor, string>;
}

/**
 * All palette definitions
 */
export const palettes: Record<PaletteName, Palette> = {
  classic: {
    name: 'Classic',
    codes: {
      default: '\x1b[0m',
      yellow: '\x1b[33;1m',
      red: '\x1b[31;1m',
      green: '\x1b[32;1m',
    },
  },
  bright: {
    name: 'Bright',
    codes: {
      default: '\x1b[0m',
      yellow: '\x1b[93m',
      red: '\x1b[91m',
      green: '\x1b[92m',
    },
  },
  // No hues at all, for terminals (or eyes) where red/green blur together
  mono: {
    name: 'Monochrome',
    codes: {
      default: '\x1b[0m',
      yellow: '\x1b[0;1m',
      red: '\x1b[0;4m',
      green: '\x1b[0;2m',
    },
  },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get palette by name
 */
export function getPalette(name: PaletteName): Palette {
  return palettes[name];
}

/**
 * Get ANSI escape code for a color in a palette
 */
export function getAnsiColor(name: PaletteName, color: TextColor): string {
  return palettes[name].codes[color];
}

/**
 * Check if a string is a valid palette name
 */
export function isValidPaletteName(value: string): value is PaletteName {
  return PALETTE_NAMES.some(name => name === value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
