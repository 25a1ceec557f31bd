export { Color } from './consts/colors.js';
export { Menu, type MenuRuntime } from './menu/menu.js';
export { defaultMenuProps, exitOption } from './menu/props.js';
export {
  computeMaxWidth,
  computeMenuLayout,
  computeOptionsPerPage,
  computePageCount,
  getPageBounds,
} from './menu/layout.js';
export { applyMenuKey, createNavigationState, type NavigationUpdate } from './menu/navigation.js';
export { renderFrame, type MenuFrame, type MenuView } from './menu/render.js';
export { classifyKeypress, type Key, type KeyName } from './ui/keys.js';
export { NodeTerminal, type TerminalDriver } from './ui/terminal-driver.js';
export { createMenuChalk } from './utils/style.js';
export type {
  MenuAction,
  MenuLayout,
  MenuOption,
  MenuProps,
  NavigationState,
  StyleSetting,
  TerminalSize,
} from './types.js';
