import { escapeRegExp, normalizeUtterance, words } from '../lib/strings';
import { defaultLexicon, type Lexicon } from './resources';
import type { Sentiment } from './types';

const VOWELS = /[aeiouy]/;
const CONSONANT_RUN = /[bcdfghjklmnpqrstvwxz]{5,}/;
const LAUGHTER = /^(?:ha|he|hi|ho|lo|l)+h?$/;

const phraseCache = new WeakMap<readonly string[], RegExp>();

function phrasePattern(phrases: readonly string[]): RegExp {
  let rx = phraseCache.get(phrases);
  if (!rx) {
    const alternatives = [...phrases]
      .map((p) => normalizeUtterance(p))
      .filter(Boolean)
      .sort((a, b) => b.length - a.length)
      .map((p) => escapeRegExp(p).replace(/ /g, '\\s+'));
    rx = alternatives.length
      ? new RegExp(`(?<![a-z0-9'])(?:${alternatives.join('|')})(?![a-z0-9])`, 'g')
      : /(?!)/g;
    phraseCache.set(phrases, rx);
  }
  rx.lastIndex = 0;
  return rx;
}

export function isOffensive(text: string, lexicon: Lexicon = defaultLexicon()): boolean {
  const normalized = normalizeUtterance(text);
  if (!normalized) return false;
  return phrasePattern(lexicon.offensive).test(normalized);
}

// A negation only counts when the speaker states it about themselves.
const SUBJECT = "(?:i|i'm|im|i'd|i'll|we|we're)";
const FOLLOWING_VERB = '(?:\\s+(?:want|wanna|going|gonna|plan|planning|try|trying)(?:\\s+to)?)?';
// "why not", "should i or should i not": the negation is part of a question.
const QUESTIONING = new Set(['why', 'whether', 'or', 'should', "shouldn't"]);

function negatedBefore(prefix: string, lexicon: Lexicon): boolean {
  const tail = prefix.split(' ').slice(-6);
  if (tail.some((word) => QUESTIONING.has(word))) return false;
  const text = tail.join(' ');
  return lexicon.negations.some((cue) => {
    const rx = new RegExp(
      `(?:^|\\s)${SUBJECT}(?:\\s+[a-z']+){0,2}?\\s+${escapeRegExp(normalizeUtterance(cue))}${FOLLOWING_VERB}\\s*$`,
    );
    return rx.test(text);
  });
}

/**
 * True when the text contains a crisis phrase that is not directly negated.
 * "I want to die" matches; "I would never hurt myself" does not.
 */
export function detectCrisis(text: string, lexicon: Lexicon = defaultLexicon()): boolean {
  const normalized = normalizeUtterance(text);
  if (!normalized) return false;
  const rx = phrasePattern(lexicon.crisis);
  for (const match of normalized.matchAll(rx)) {
    const start = match.index ?? 0;
    if (!negatedBefore(normalized.slice(0, start).trimEnd(), lexicon)) return true;
  }
  return false;
}

function isGibberishToken(token: string, soleToken: boolean, known: ReadonlySet<string>): boolean {
  if (known.has(token)) return false;
  if (soleToken && token.length <= 2) return true;
  if (CONSONANT_RUN.test(token)) return true;
  if (token.length >= 3 && !VOWELS.test(token)) return true;
  if (token.length >= 5 && new Set(token).size <= 2 && !LAUGHTER.test(token)) return true;
  return false;
}

const knownCache = new WeakMap<readonly string[], ReadonlySet<string>>();

function knownWords(lexicon: Lexicon): ReadonlySet<string> {
  let set = knownCache.get(lexicon.knownWords);
  if (!set) {
    set = new Set(lexicon.knownWords.map((w) => w.toLowerCase()));
    knownCache.set(lexicon.knownWords, set);
  }
  return set;
}

/**
 * Keyboard mashing and similar noise. Looks only at alphabetic tokens; input
 * with none (digits, emoji) is not treated as gibberish.
 */
export function isGibberish(text: string, lexicon: Lexicon = defaultLexicon()): boolean {
  const tokens = normalizeUtterance(text)
    .split(' ')
    .map((t) => t.replace(/[^a-z]/g, ''))
    .filter(Boolean);
  if (tokens.length === 0) return false;
  const known = knownWords(lexicon);
  const noisy = tokens.filter((t) => isGibberishToken(t, tokens.length === 1, known)).length;
  return noisy * 2 > tokens.length;
}

export function sentiment(text: string, lexicon: Lexicon = defaultLexicon()): Sentiment {
  const tokens = words(normalizeUtterance(text));
  if (tokens.length === 0) return 'neutral';
  const positive = new Set(lexicon.positive);
  const negative = new Set(lexicon.negative);
  let score = 0;
  tokens.forEach((token, i) => {
    const polarity = positive.has(token) ? 1 : negative.has(token) ? -1 : 0;
    if (!polarity) return;
    const prev = tokens[i - 1] ?? '';
    const flipped = prev === 'not' || prev === 'never' || prev.endsWith("n't");
    score += flipped ? -polarity : polarity;
  });
  if (score > 0) return 'positive';
  if (score < 0) return 'negative';
  return 'neutral';
}

/** Most frequent content words, for history annotations. */
export function keyPhrases(text: string, k = 3, lexicon: Lexicon = defaultLexicon()): string[] {
  const stop = new Set(lexicon.stopWords);
  const freq = new Map<string, number>();
  for (const w of words(text)) {
    if (w.includes("'") || w.length <= 3 || stop.has(w)) continue;
    freq.set(w, (freq.get(w) ?? 0) + 1);
  }
  return [...freq.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, k)
    .map(([w]) => w);
}
