import { cloneContext, USED_HISTORY_LIMIT } from './context';
import { templatesFor, type TemplateLibrary } from './resources';
import type { DialogueContext, TemplateKey } from './types';

export type RandomSource = () => number;

export type Selection = {
  text: string;
  index: number;
  context: DialogueContext;
};

export function shuffledIndices(size: number, random: RandomSource): number[] {
  const out = Array.from({ length: size }, (_, i) => i);
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Deals the next template for `key` from a per-key shuffled deck. A deck is
 * reshuffled only once exhausted, so within one cycle no index repeats, and a
 * fresh cycle never opens with the index dealt last. Returns null when the key
 * has no templates.
 */
export function selectResponse(
  key: TemplateKey,
  context: DialogueContext,
  library: TemplateLibrary,
  random: RandomSource = Math.random,
): Selection | null {
  const templates = templatesFor(library, key);
  if (templates.length === 0) return null;

  const next = cloneContext(context);
  const used = next.used_responses[key] ?? [];
  let deck = (next.response_decks[key] ?? []).filter((i) => i < templates.length);
  if (deck.length === 0) {
    deck = shuffledIndices(templates.length, random);
    const last = used[used.length - 1];
    if (deck.length > 1 && deck[0] === last) {
      [deck[0], deck[deck.length - 1]] = [deck[deck.length - 1], deck[0]];
    }
  }

  const [index, ...rest] = deck;
  next.response_decks[key] = rest;
  next.used_responses[key] = [...used, index].slice(-USED_HISTORY_LIMIT);
  return { text: templates[index], index, context: next };
}
