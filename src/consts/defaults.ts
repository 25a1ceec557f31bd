export namespace Defaults {
  /**
   * Rows kept free for the box chrome when deciding how many options fit on a page.
   */
  export const ReservedRows = 6;

  /**
   * Visible columns added around the widest content line: two leading spaces plus the right margin.
   */
  export const BoxPadding = 4;

  export const TerminalRows = 24;

  export const TerminalColumns = 80;

  export const DemoOptionCount = 30;
}
