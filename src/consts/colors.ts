/**
 * A few pre-picked 8-bit colors for theming menus.
 *
 * Values 0-15 are drawn from the terminal's own palette, so they vary between themes.
 */
export namespace Color {
  export const White = 15;
  export const LightGray = 7;
  export const Gray = 8;
  export const Blue = 32;
  export const Green = 35;
  export const Purple = 99;
  export const Red = 160;
  export const Orange = 208;
  export const Yellow = 220;
  export const Black = 233;
  export const DarkGray = 236;
}
