// Theme definitions for gitfold

import type { Color } from './utils/ansi.js';

export type ThemeName = 'dark' | 'light' | 'dark-ansi' | 'light-ansi';

export interface ThemeColors {
  // Diff line text
  addition: Color;
  deletion: Color;
  context: Color;
  hunkHeader: Color;
  // Outline chrome
  sectionTitle: Color;
  hash: Color;
  muted: Color;
  error: Color;
  // Overlay backgrounds
  cursorBg: Color;
  selectionBg: Color;
}

export interface Theme {
  name: ThemeName;
  colors: ThemeColors;
}

const darkTheme: Theme = {
  name: 'dark',
  colors: {
    addition: '#5fd75f',
    deletion: '#ff5f5f',
    context: 'white',
    hunkHeader: '#5fafff',
    sectionTitle: '#ffd75f',
    hash: '#d7af5f',
    muted: 'gray',
    error: 'redBright',
    cursorBg: '#3a3a3a',
    selectionBg: '#1c3b5a',
  },
};

const lightTheme: Theme = {
  name: 'light',
  colors: {
    addition: '#2f9d44',
    deletion: '#d1454b',
    context: 'black',
    hunkHeader: '#1f5fbf',
    sectionTitle: '#9a6700',
    hash: '#8a5a00',
    muted: '#6c757d',
    error: 'red',
    cursorBg: '#dadada',
    selectionBg: '#b6d7ff',
  },
};

// ANSI themes use the terminal's own 16-color palette
const darkAnsiTheme: Theme = {
  name: 'dark-ansi',
  colors: {
    addition: 'greenBright',
    deletion: 'redBright',
    context: 'white',
    hunkHeader: 'blueBright',
    sectionTitle: 'yellow',
    hash: 'yellow',
    muted: 'gray',
    error: 'redBright',
    cursorBg: 'gray',
    selectionBg: 'blue',
  },
};

const lightAnsiTheme: Theme = {
  name: 'light-ansi',
  colors: {
    addition: 'green',
    deletion: 'red',
    context: 'black',
    hunkHeader: 'blue',
    sectionTitle: 'yellow',
    hash: 'yellow',
    muted: 'gray',
    error: 'red',
    cursorBg: 'white',
    selectionBg: 'cyan',
  },
};

export const themes: Record<ThemeName, Theme> = {
  dark: darkTheme,
  light: lightTheme,
  'dark-ansi': darkAnsiTheme,
  'light-ansi': lightAnsiTheme,
};

export function getTheme(name: ThemeName): Theme {
  return themes[name] ?? themes['dark'];
}
