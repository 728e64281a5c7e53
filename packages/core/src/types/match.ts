/**
 * Half-open `[start, end)` offsets into the searched text, in UTF-16 code
 * units.
 * @public
 */
export interface Span {
  readonly start: number
  readonly end: number
}

/**
 * A successful match: its span plus the matched text.
 * @public
 */
export interface Match extends Span {
  /** `text.slice(start, end)` */
  readonly value: string
}

/**
 * Replacement for `Engine.sub`: fixed text, or computed per match.
 * @public
 */
export type Replacement = string | ((match: Match) => string)
