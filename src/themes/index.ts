/**
 * Terminal color themes
 *
 * ANSI escape codes used to tint the board chrome.
 */

export const THEME_MODES = [
  'cyan',
  'cyanLight',
  'amber',
  'green',
  'white',
  'hotpink',
  'hotpinkLight',
  'blood',
  'ice',
  'iceLight',
  'bladerunner',
  'bladerunnerLight',
  'tron',
  'tronLight',
  'daylight',
  'kawaii',
  'kawaiiLight',
  'oled',
  'solarized',
  'solarizedLight',
  'nord',
  'nordLight',
  'highcontrast',
  'highcontrastLight',
  'banana',
  'cream',
] as const;

export type PhosphorMode = (typeof THEME_MODES)[number];

/**
 * ANSI escape codes for terminal text coloring
 */
const ansiCodes: Record<PhosphorMode, string> = {
  cyan: '\x1b[96m',
  cyanLight: '\x1b[38;5;31m',
  amber: '\x1b[93m',
  green: '\x1b[92m',
  white: '\x1b[97m',
  hotpink: '\x1b[95m',
  hotpinkLight: '\x1b[38;5;169m',
  blood: '\x1b[91m',
  ice: '\x1b[96m',
  iceLight: '\x1b[38;5;31m',
  bladerunner: '\x1b[38;5;208m',
  bladerunnerLight: '\x1b[38;5;166m',
  tron: '\x1b[96m',
  tronLight: '\x1b[38;5;30m',
  daylight: '\x1b[34m',
  kawaii: '\x1b[95m',
  kawaiiLight: '\x1b[35m',
  oled: '\x1b[97m',
  solarized: '\x1b[36m',
  solarizedLight: '\x1b[38;5;66m',
  nord: '\x1b[96m',
  nordLight: '\x1b[38;5;59m',
  highcontrast: '\x1b[97m',
  highcontrastLight: '\x1b[30m',
  banana: '\x1b[93m',
  cream: '\x1b[38;5;130m',
};

/**
 * Light themes that need dark text
 */
const lightThemes: Set<PhosphorMode> = new Set([
  'cyanLight',
  'hotpinkLight',
  'iceLight',
  'bladerunnerLight',
  'tronLight',
  'daylight',
  'kawaiiLight',
  'solarizedLight',
  'nordLight',
  'highcontrastLight',
  'cream',
]);

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return ansiCodes[mode];
}

/**
 * Check if a theme is light (needs dark text)
 */
export function isLightTheme(mode: PhosphorMode): boolean {
  return lightThemes.has(mode);
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return [...THEME_MODES];
}

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return THEME_MODES.some((mode) => mode === value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';