import type { TerminatorSpec } from "../types/terminator.types.js";

const PREFIX_MARKER = "^";
const SUFFIX_MARKER = "$";

/**
 * Parse one terminator string into its anchored forms
 * @param pattern - Caller-facing terminator, e.g. `^login:`, `$ $` or `done`
 * @returns Specs to try; empty for an empty pattern
 */
export function parseTerminator(pattern: string): TerminatorSpec[] {
  if (pattern.length === 0) {
    return [];
  }

  const specs: TerminatorSpec[] = [];
  if (pattern.startsWith(PREFIX_MARKER)) {
    specs.push({ kind: "prefix", value: pattern.slice(PREFIX_MARKER.length) });
  }
  if (pattern.endsWith(SUFFIX_MARKER)) {
    specs.push({ kind: "suffix", value: pattern.slice(0, -SUFFIX_MARKER.length) });
  }
  if (specs.length === 0) {
    specs.push({ kind: "contains", value: pattern });
  }
  return specs;
}

export function parseTerminators(patterns: readonly string[]): TerminatorSpec[] {
  return patterns.flatMap(parseTerminator);
}

export function matchesSpec(text: string, spec: TerminatorSpec): boolean {
  switch (spec.kind) {
    case "prefix":
      return text.startsWith(spec.value);
    case "suffix":
      return text.endsWith(spec.value);
    case "contains":
      return text.includes(spec.value);
  }
}

/**
 * Check whether accumulated text satisfies any of the terminators
 *
 * Prefix terminators test the whole accumulated text, so they can only
 * fire on what arrived first.
 */
export function matches(text: string, patterns: readonly string[]): boolean {
  return parseTerminators(patterns).some((spec) => matchesSpec(text, spec));
}
