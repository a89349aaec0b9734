/**
 * Completion pattern parsed from a caller-supplied terminator string.
 *
 * - `prefix`: a leading `^` anchors the remainder to the start of the text
 * - `suffix`: a trailing `$` anchors the remainder to the end of the text
 * - `contains`: anything else matches anywhere in the text
 *
 * A string carrying both markers yields two specs.
 */
export type TerminatorSpec =
  | { kind: "prefix"; value: string }
  | { kind: "suffix"; value: string }
  | { kind: "contains"; value: string };
