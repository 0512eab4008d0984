import { describe, it, expect } from 'vitest';
import { ANSI_RESET, THEME_MODES, getAnsiColor, getThemeModes, isLightTheme, isValidThemeMode } from './index';

describe('themes', () => {
  it('lists every mode', () => {
    expect(getThemeModes()).toEqual([...THEME_MODES]);
    expect(getThemeModes()).toHaveLength(26);
  });

  it('validates theme names', () => {
    expect(isValidThemeMode('amber')).toBe(true);
    expect(isValidThemeMode('nordLight')).toBe(true);
    expect(isValidThemeMode('Amber')).toBe(false);
    expect(isValidThemeMode('')).toBe(false);
  });

  it('maps modes to ANSI colors', () => {
    expect(getAnsiColor('cyan')).toBe('\x1b[96m');
    expect(getAnsiColor('green')).toBe('\x1b[92m');
    expect(ANSI_RESET).toBe('\x1b[0m');
  });

  it('flags light themes', () => {
    expect(isLightTheme('cyanLight')).toBe(true);
    expect(isLightTheme('cream')).toBe(true);
    expect(isLightTheme('oled')).toBe(false);
  });
});
