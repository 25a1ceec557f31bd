/**
 * Runs when its option is confirmed. May be invoked many times when the menu stays open.
 */
export type MenuAction = () => void | Promise<void>;

export interface MenuOption {
  label: string;
  action: MenuAction;
}

/**
 * Menu configuration. Colors are 8-bit indexes (0-255).
 */
export interface MenuProps {
  /**
   * Shown above the options. Empty string for none.
   */
  title: string;
  /**
   * Footer shown below the options. Empty string for none.
   */
  message: string;
  /**
   * Close the menu as soon as an option is confirmed.
   */
  exitOnAction: boolean;
  bgColor: number;
  fgColor: number;
  /**
   * Falls back to `fgColor` when unset.
   */
  titleColor?: number;
  /**
   * Falls back to `fgColor` when unset.
   */
  selectedColor?: number;
  /**
   * Falls back to `fgColor` when unset.
   */
  msgColor?: number;
  /**
   * Terminal rows kept free for the box chrome when paginating.
   */
  reservedRows?: number;
}

export interface ResolvedMenuProps {
  title?: string;
  message?: string;
  exitOnAction: boolean;
  bgColor: number;
  fgColor: number;
  titleColor: number;
  selectedColor: number;
  msgColor: number;
  reservedRows: number;
}

export interface MenuLayout {
  optionCount: number;
  optionsPerPage: number;
  pageCount: number;
  /**
   * Widest label, title or message.
   */
  maxWidth: number;
  /**
   * `maxWidth`, widened to fit the page indicator when there is more than one page.
   */
  contentWidth: number;
}

export interface PageBounds {
  pageStart: number;
  /**
   * Inclusive.
   */
  pageEnd: number;
}

export interface NavigationState extends PageBounds {
  selectedOption: number;
  selectedPage: number;
}

export interface TerminalSize {
  rows: number;
  columns: number;
}

export type StyleSetting = 'on' | 'off';
