/**
 * Types for the inline renderer
 */

/**
 * A `[label](url)` occurrence inside a text span
 */
export interface LinkSpan {
  /** Link label, unescaped */
  label: string;

  /** Link target, unescaped */
  url: string;

  /** Offset of the opening bracket */
  start: number;

  /** Offset just past the closing parenthesis */
  end: number;
}
