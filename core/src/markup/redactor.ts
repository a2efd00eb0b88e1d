/**
 * Placeholder substitution for redaction markup in annotation text.
 *
 * Annotators tag sensitive spans with one of three forms:
 *
 *   [anon type="name"]...[/anon]   [name]...[/name]      -> (NAME)
 *   [anon type="..."]...[/anon]    [sensitive]...[/sensitive] -> (SENSITIVE)
 *
 * Rules run in the order listed, each replacing every non-overlapping match
 * left to right. The enclosed text is dropped, never echoed into the placeholder.
 */

export const NAME_PLACEHOLDER = '(NAME)';
export const SENSITIVE_PLACEHOLDER = '(SENSITIVE)';

interface RedactionRule {
  pattern: RegExp;
  placeholder: string;
}

const REDACTION_RULES: readonly RedactionRule[] = [
  { pattern: /\[anon type="name"\].*?\[\/anon\]/gs, placeholder: NAME_PLACEHOLDER },
  { pattern: /\[name\].*?\[\/name\]/gs, placeholder: NAME_PLACEHOLDER },
  { pattern: /\[anon type=".*?"\].*?\[\/anon\]/gs, placeholder: SENSITIVE_PLACEHOLDER },
  { pattern: /\[sensitive\].*?\[\/sensitive\]/gs, placeholder: SENSITIVE_PLACEHOLDER },
];

const MARKUP_PRECHECK = /\[\/?(anon|name|sensitive)/;

export interface RedactedText {
  text: string;
  changed: boolean;
}

/**
 * Cheap membership test run before {@link redactMarkup}; most annotation values carry no tags.
 */
export function containsRedactionMarkup(text: string): boolean {
  return MARKUP_PRECHECK.test(text);
}

export function redactMarkup(text: string): RedactedText {
  let result = text;
  for (const rule of REDACTION_RULES) {
    result = result.replace(rule.pattern, rule.placeholder);
  }
  return { text: result, changed: result !== text };
}
