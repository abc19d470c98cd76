/**
 * Glyph sets for bars and spinners
 */

// ============================================================================
// Block Characters for Bars
// ============================================================================

export const blocks = {
  full: "█",
  threeQuarter: "▓",
  half: "▒",
  quarter: "░",
  empty: " ",
};

// ============================================================================
// Spinner Frames
// ============================================================================

export const spinners = {
  // Classic ASCII, safe everywhere
  ascii: ["|", "/", "-", "\\"],

  // Braille dots
  braille: ["⣾", "⣽", "⣻", "⢿", "⡿", "⣟", "⣯", "⣷"],

  dots: ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"],

  // Growing bar
  bar: ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"],

  arrows: ["←", "↖", "↑", "↗", "→", "↘", "↓", "↙"],
};

export type SpinnerName = keyof typeof spinners;
