export namespace Ansi {
  /**
   * Home, clear to end of screen, home again.
   */
  export const ClearScreen = '\x1B[H\x1B[J\x1B[H';

  export const HideCursor = '\x1B[?25l';

  export const ShowCursor = '\x1B[?25h';
}
