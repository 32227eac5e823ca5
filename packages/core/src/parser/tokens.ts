/**
 * Token classification shared by global-option extraction, the binder and the matcher.
 */

/** Literal that switches every following token to positional. */
export const END_OF_OPTIONS = "--";

/** "-" followed immediately by a digit, e.g. -5 or -0.25. */
export function isNegativeNumber(token: string): boolean {
  return /^-\d/.test(token);
}

/** True for --long, -s and -abc; false for "-", "--" and negative numbers. */
export function looksLikeOption(token: string): boolean {
  if (token === "-" || token === END_OF_OPTIONS) return false;
  return token.startsWith("-") && !isNegativeNumber(token);
}

export interface LongOption {
  name: string;
  /** Text after "=", if the token carried one */
  inline?: string;
}

/** Split "--name" / "--name=value". Caller guarantees the "--" prefix. */
export function splitLongOption(token: string): LongOption {
  const body = token.slice(2);
  const eq = body.indexOf("=");
  if (eq === -1) return { name: body };
  return { name: body.slice(0, eq), inline: body.slice(eq + 1) };
}
