import type { IntentTag } from './types';

export type IntentRule = {
  tag: Exclude<IntentTag, 'unknown'>;
  test: (text: string) => boolean;
};

const matches = (rx: RegExp) => (text: string) => rx.test(text);

/**
 * Evaluated top to bottom against normalized text; the first hit wins.
 * Bare requests for help sit above every keyword rule so that "help" is never
 * read as stress, and uncertainty sits above the motivation-step questions so
 * "i don't know what to do" escalates through the uncertainty tiers.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    tag: 'ask_for_help_general',
    test: matches(/^(?:please )?(?:help|help me|help me please|i need help|need help|can you help(?: me)?|somebody help(?: me)?|please help(?: me)?)(?: please)?$/),
  },
  {
    tag: 'express_uncertainty',
    test: matches(/\b(?:i don'?t know|i do not know|idk|dunno|not sure|i'?m unsure|no idea|no clue|i have no clue)\b/),
  },
  {
    tag: 'ask_for_motivation_step',
    test: matches(/\b(?:what should i do|what do i do|what can i do|where do i start|where should i start|how do i start|how do i begin|next step|first step|give me a step|how do i get motivated|how can i get motivated)\b/),
  },
  {
    tag: 'simple_greeting',
    test: matches(/^(?:hi|hello|hey|hiya|howdy|yo|namaste|good (?:morning|afternoon|evening))(?: there)?$/),
  },
  {
    tag: 'simple_statement',
    test: matches(/^(?:ok|okay|k|kk|fine|sure|yes|yeah|yep|no|nope|nah|thanks|thank you|thx|ty|alright|cool|right|hmm|i see|got it)$/),
  },
  {
    tag: 'simple_continuation',
    test: matches(/^(?:and|so|then|and then|go on|tell me more|more|continue|keep going|what else|what next)$/),
  },
  {
    tag: 'express_stress',
    test: matches(/\b(?:stress|stressed|stressful|anxious|anxiety|overwhelm(?:ed|ing)?|pressure|panic(?:king)?|nervous|worried|worry|tense|exams?|deadlines?|burn(?:ed|t)? out|burnout)\b/),
  },
  {
    tag: 'express_sadness',
    test: matches(/\b(?:sad|sadness|depressed|depressing|lonely|alone|unhappy|cry|crying|cried|hopeless|heartbroken|miserable|empty|grief|grieving|upset|feel(?:ing)? down|feel(?:ing)? low)\b/),
  },
  {
    tag: 'express_motivation',
    test: matches(/\b(?:motivat\w*|unmotivated|lazy|procrastinat\w*|can'?t focus|no energy|giving up|give up|stuck|inspire|inspiration)\b/),
  },
  {
    tag: 'express_anger',
    test: matches(/\b(?:angry|anger|mad|furious|annoyed|irritated|frustrat\w*|rage|pissed|hate)\b/),
  },
  {
    tag: 'request_breathing',
    test: matches(/\b(?:breath\w*|calm down|calm me|relax\w*|meditat\w*|grounding)\b/),
  },
  {
    tag: 'ask_for_gita_wisdom',
    test: matches(/\b(?:gita|bhagavad|krishna|arjuna|karma|dharma|spiritual\w*|wisdom|scriptures?)\b/),
  },
];

export function resolveIntent(normalizedText: string, rules: readonly IntentRule[] = INTENT_RULES): IntentTag {
  for (const rule of rules) {
    if (rule.test(normalizedText)) return rule.tag;
  }
  return 'unknown';
}
