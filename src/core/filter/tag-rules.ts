/**
 * Tag filter rules ("key:regex")
 */

import { ConfigError } from "../../config/errors";
import type { TagRule, Volume } from "../../types";

export interface TagMismatch {
  rule: TagRule;
  /** Tag value when the key exists but the pattern does not match */
  value?: string;
}

/**
 * Parse a single "key:regex" rule. Only the first colon separates key and
 * pattern, so patterns may contain colons themselves.
 */
export function parseTagRule(input: string): TagRule {
  const separator = input.indexOf(":");
  const key = separator === -1 ? input : input.slice(0, separator);
  const pattern = separator === -1 ? "" : input.slice(separator + 1);

  if (!key || !pattern) {
    throw new ConfigError(`Malformed tag filter "${input}", expected "key:regex"`);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Invalid regex in tag filter "${input}": ${reason}`);
  }

  return { key, pattern, regex };
}

export function parseTagRules(inputs: readonly string[]): TagRule[] {
  return inputs.map(parseTagRule);
}

/**
 * First rule the volume fails, or null when every rule matches
 */
export function findTagMismatch(volume: Volume, rules: readonly TagRule[]): TagMismatch | null {
  for (const rule of rules) {
    if (!Object.hasOwn(volume.tags, rule.key)) {
      return { rule };
    }
    const value = volume.tags[rule.key] ?? "";
    if (!rule.regex.test(value)) {
      return { rule, value };
    }
  }
  return null;
}

export function matchesTagRules(volume: Volume, rules: readonly TagRule[]): boolean {
  return findTagMismatch(volume, rules) === null;
}
