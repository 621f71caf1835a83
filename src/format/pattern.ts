/**
 * Length and character-class estimation for xs:pattern values.
 *
 * Supported grammar: literal characters, escaped pairs (`\x`), bracket classes
 * `[...]`, groups `(...)` and the quantifiers `{m}` / `{m,n}`. A group that
 * holds another group may not itself be quantified.
 * Anything else is reported as unsupported by `analyzePattern`.
 */

export type PatternAnalysis =
  | { status: 'measured'; length: number }
  | { status: 'unknown' }
  | { status: 'unsupported'; construct: string };

export type PatternCharClass = 'digits' | 'letters' | 'alnum' | 'text';

const QUANTIFIER = String.raw`(?:\{(\d+)(?:,(\d+))?\})?`;
const GROUP_RE = new RegExp(String.raw`\(([^()]+)\)` + QUANTIFIER);
const CHAR_CLASS_RE = new RegExp(String.raw`\[([^\]]+)\]` + QUANTIFIER);
const ATOM_RE = new RegExp(String.raw`(\\?.)` + QUANTIFIER, 'gu');

function bound(min: string | undefined, max: string | undefined): number {
  return Number.parseInt(max ?? min ?? '1', 10);
}

function removeSpan(text: string, match: RegExpExecArray): string {
  return text.slice(0, match.index) + text.slice(match.index + match[0].length);
}

/**
 * Three reduction passes: groups, bracket classes, remaining atoms.
 */
function measure(pattern: string): number {
  let total = 0;
  let rest = pattern;

  for (let m = GROUP_RE.exec(rest); m; m = GROUP_RE.exec(rest)) {
    total += measure(m[1]) * bound(m[2], m[3]);
    rest = removeSpan(rest, m);
  }

  for (let m = CHAR_CLASS_RE.exec(rest); m; m = CHAR_CLASS_RE.exec(rest)) {
    total += bound(m[2], m[3]);
    rest = removeSpan(rest, m);
  }

  for (const m of rest.matchAll(ATOM_RE)) {
    total += bound(m[2], m[3]);
  }

  return total;
}

/**
 * Returns the first construct outside the supported grammar, if any.
 */
export function findUnsupportedConstruct(pattern: string): string | undefined {
  let inClass = false;
  // one entry per open group: whether it contains a group
  const groups: boolean[] = [];

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];

    if (ch === '\\') {
      const next = pattern.charAt(i + 1);
      if (!inClass && next >= '1' && next <= '9') return `\\${next}`;
      i++;
      continue;
    }

    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }

    switch (ch) {
      case '[':
        inClass = true;
        break;
      case '|':
      case '*':
      case '+':
      case '?':
        return ch;
      case '(':
        if (groups.length > 0) groups[groups.length - 1] = true;
        groups.push(false);
        break;
      case ')':
        if (groups.pop() && pattern.charAt(i + 1) === '{') return '((...))';
        break;
      case '{': {
        const open = /^\{\d+,\}/.exec(pattern.slice(i));
        if (open) return open[0];
        break;
      }
      default:
        break;
    }
  }
  return undefined;
}

/**
 * Estimates the maximum number of characters a pattern can produce.
 */
export function analyzePattern(pattern: string): PatternAnalysis {
  const construct = findUnsupportedConstruct(pattern);
  if (construct !== undefined) return { status: 'unsupported', construct };

  const length = measure(pattern);
  return length > 0 ? { status: 'measured', length } : { status: 'unknown' };
}

/**
 * Maximum length of a pattern, or `undefined` when nothing measurable was
 * found or the pattern leaves the supported grammar. Never returns 0.
 */
export function estimatePatternLength(pattern: string): number | undefined {
  const analysis = analyzePattern(pattern);
  return analysis.status === 'measured' ? analysis.length : undefined;
}

/**
 * Classifies the literal content of a pattern.
 *
 * The `text` test runs on the pattern with classes, groups and quantifiers
 * stripped; digit/letter presence is read from the unmodified pattern.
 */
export function classifyPatternChars(pattern: string): PatternCharClass | undefined {
  if (!pattern) return undefined;

  const stripped = pattern
    .replace(/\[[^\]]+\]/g, '')
    .replace(/\([^)]+\)/g, '')
    .replace(/\{\d+(?:,\d+)?\}/g, '');

  const hasDigit = /\d/.test(pattern);
  const hasAlpha = /[A-Za-z]/.test(pattern);

  if (/[^A-Za-z0-9]/.test(stripped)) return 'text';
  if (hasDigit && !hasAlpha) return 'digits';
  if (hasDigit && hasAlpha) return 'alnum';
  if (hasAlpha) return 'letters';
  return undefined;
}
