/**
 * Global option extraction: pulls registered global options out of the raw
 * token list before routing.
 *
 * Recognizes --name, --name=value, -x and bundled -xy. Global characters are
 * removed from a bundle and the rest is left as "-<rest>" for the command.
 * Scanning stops at "--"; negative numbers are never treated as flags.
 */

import {
  OptionMissingValueError,
  OptionValueError,
  type GlobalOptionInfo,
  type GlobalOptionValue,
} from "@clidispatch/sdk";
import { coerceGlobal } from "../parser/coerce.js";
import { END_OF_OPTIONS, isNegativeNumber, looksLikeOption, splitLongOption } from "../parser/tokens.js";

export interface GlobalOptionMatch {
  option: GlobalOptionInfo;
  value: GlobalOptionValue;
}

export interface GlobalExtraction {
  /** Tokens left for routing and binding */
  remaining: string[];
  /** Matches in encounter order; repeated options appear once per occurrence */
  matches: GlobalOptionMatch[];
}

export function extractGlobalOptions(
  tokens: readonly string[],
  options: readonly GlobalOptionInfo[],
): GlobalExtraction {
  const byName = new Map(options.map((opt) => [opt.name, opt]));
  const byShort = new Map<string, GlobalOptionInfo>();
  for (const opt of options) {
    if (opt.short !== undefined) byShort.set(opt.short, opt);
  }

  const remaining: string[] = [];
  const matches: GlobalOptionMatch[] = [];

  function coerce(opt: GlobalOptionInfo, raw: string, display: string, isShort: boolean): GlobalOptionValue {
    const result = coerceGlobal(opt.type, raw);
    if (!result.ok) throw new OptionValueError(display, raw, result.expected, isShort);
    return result.value;
  }

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    i++;

    if (token === END_OF_OPTIONS) {
      remaining.push(token, ...tokens.slice(i));
      break;
    }

    if (token.startsWith("--")) {
      const { name, inline } = splitLongOption(token);
      const opt = byName.get(name);
      if (!opt) {
        remaining.push(token);
        continue;
      }
      let value: GlobalOptionValue;
      if (inline !== undefined) {
        value = coerce(opt, inline, name, false);
      } else if (opt.type === "boolean") {
        value = true;
      } else if (i < tokens.length && !looksLikeOption(tokens[i])) {
        value = coerce(opt, tokens[i], name, false);
        i++;
      } else {
        throw new OptionMissingValueError(name);
      }
      matches.push({ option: opt, value });
      continue;
    }

    if (token.startsWith("-") && token !== "-" && !isNegativeNumber(token)) {
      const chars = [...token.slice(1)];
      let kept = "";
      for (const [index, ch] of chars.entries()) {
        const opt = byShort.get(ch);
        if (!opt) {
          kept += ch;
          continue;
        }
        if (opt.type === "boolean") {
          matches.push({ option: opt, value: true });
          continue;
        }
        if (index === chars.length - 1 && i < tokens.length && !looksLikeOption(tokens[i])) {
          matches.push({ option: opt, value: coerce(opt, tokens[i], ch, true) });
          i++;
          continue;
        }
        throw new OptionMissingValueError(ch, true);
      }
      if (kept.length === chars.length) {
        remaining.push(token);
      } else if (kept.length > 0) {
        remaining.push(`-${kept}`);
      }
      continue;
    }

    remaining.push(token);
  }

  return { remaining, matches };
}

/** Each option's declared default, keyed by name. */
export function defaultGlobalValues(options: readonly GlobalOptionInfo[]): Map<string, GlobalOptionValue> {
  return new Map<string, GlobalOptionValue>(options.map((opt) => [opt.name, opt.default]));
}
