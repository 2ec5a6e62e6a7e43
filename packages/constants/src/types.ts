/**
 * Human-friendly error description: a headline followed by optional detail lines.
 */
export type UserErrorMessage = readonly [string, ...string[]];
