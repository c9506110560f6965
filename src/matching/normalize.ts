/**
 * Text normalization and script-aware tokenization.
 *
 * Queries are short and often mix Latin product names with Japanese or
 * Chinese text that has no spaces, so tokens are split on whitespace and
 * again wherever the writing system changes: "pip makerとは何ですか"
 * becomes ["pip", "maker", "とは", "何", "ですか"].
 */

type Script = 'han' | 'hiragana' | 'katakana' | 'hangul' | 'other';

const SCRIPT_PATTERNS: ReadonlyArray<readonly [Script, RegExp]> = [
  ['han', /\p{Script=Han}/u],
  ['hiragana', /\p{Script=Hiragana}/u],
  // The prolonged sound mark is Common script but only ever extends kana.
  ['katakana', /[\p{Script=Katakana}ー]/u],
  ['hangul', /\p{Script=Hangul}/u],
];

/** Case-fold, strip punctuation and symbols, collapse whitespace. */
export function normalize(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\p{P}\p{S}]+/gu, ' ')
    .replace(/\s+/gu, ' ')
    .trim();
}

/** Tokenize already-normalized text. */
export function tokenize(normalized: string): string[] {
  if (!normalized) return [];

  const tokens: string[] = [];
  for (const chunk of normalized.split(' ')) {
    tokens.push(...splitByScript(chunk));
  }
  return tokens;
}

function splitByScript(chunk: string): string[] {
  const runs: string[] = [];
  let current = '';
  let currentScript: Script | null = null;

  for (const char of chunk) {
    const script = scriptOf(char);
    if (currentScript !== null && script !== currentScript) {
      runs.push(current);
      current = '';
    }
    current += char;
    currentScript = script;
  }
  if (current) runs.push(current);

  return runs;
}

function scriptOf(char: string): Script {
  for (const [script, pattern] of SCRIPT_PATTERNS) {
    if (pattern.test(char)) return script;
  }
  return 'other';
}
