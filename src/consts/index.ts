export { Ansi } from './ansi.js';
export { Color } from './colors.js';
export { Defaults } from './defaults.js';

export const APP_NAME = 'console-menu';
export const APP_DESCRIPTION = 'Paginated, keyboard-driven selection menus for the terminal';

export const STYLE_ENV = 'CONSOLE_MENU_STYLE';
export const FORCE_INTERACTIVE_ENV = 'CONSOLE_MENU_FORCE_INTERACTIVE';
