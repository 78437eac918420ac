import { normalizeUtterance } from '../lib/strings';
import { detectCrisis, isGibberish, isOffensive, keyPhrases, sentiment } from './classifiers';
import { cloneContext, createContext, isMeaningfulTopic } from './context';
import { StaticCrisisResponder } from './crisis';
import { resolveIntent } from './intents';
import { emotionFor, suggestionsFor } from './mood';
import { defaultLexicon, defaultTemplateLibrary, templatesFor, type Lexicon, type TemplateLibrary } from './resources';
import { selectResponse, type RandomSource } from './selector';
import type {
  CrisisResponder,
  DialogueContext,
  IntentTag,
  TemplateKey,
  Topic,
  TurnResult,
  TurnRoute,
} from './types';

export const BUILTIN_FALLBACK = "I'm here for you. Would you like to talk more about it?";

/** Bare "help" count at which the crisis response takes over. */
export const HELP_CRISIS_THRESHOLD = 3;
export const UNCERTAINTY_LEVELS = 3;
export const REPETITION_THRESHOLD = 2;

// Intents whose own tiers depend on the user repeating themselves.
const ESCALATING: ReadonlySet<IntentTag> = new Set(['ask_for_help_general', 'express_uncertainty']);

const CONTENT_TOPICS = {
  stress: 'stress',
  sadness: 'sadness',
  motivation: 'motivation',
  anger: 'anger',
  gita: 'gita',
  calm: 'calm',
} as const satisfies Partial<Record<Topic, TemplateKey>>;

type ContentTopic = keyof typeof CONTENT_TOPICS;

function isContentTopic(topic: Topic): topic is ContentTopic {
  return topic in CONTENT_TOPICS;
}

const INTENT_ROUTES: Partial<Record<IntentTag, { key: TemplateKey; topic: Topic }>> = {
  simple_greeting: { key: 'greeting', topic: 'neutral' },
  simple_statement: { key: 'acknowledgment', topic: 'listening' },
  ask_for_motivation_step: { key: 'motivation_step', topic: 'motivation' },
  express_stress: { key: 'stress', topic: 'stress' },
  express_sadness: { key: 'sadness', topic: 'sadness' },
  express_motivation: { key: 'motivation', topic: 'motivation' },
  express_anger: { key: 'anger', topic: 'anger' },
  request_breathing: { key: 'calm', topic: 'calm' },
  ask_for_gita_wisdom: { key: 'gita', topic: 'gita' },
};

type Reply = {
  text: string;
  topic: Topic;
  missingTemplate?: TemplateKey;
};

export type DialogueEngineOptions = {
  library?: TemplateLibrary;
  lexicon?: Lexicon;
  crisis?: CrisisResponder;
  random?: RandomSource;
  now?: () => Date;
};

export type DialogueEngine = {
  processTurn(input: string, context?: DialogueContext): TurnResult;
};

export function createDialogueEngine(options: DialogueEngineOptions = {}): DialogueEngine {
  const library = options.library ?? defaultTemplateLibrary();
  const lexicon = options.lexicon ?? defaultLexicon();
  const crisis = options.crisis ?? new StaticCrisisResponder();
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  // Mutates ctx: it is always the engine's own working copy.
  function pick(ctx: DialogueContext, key: TemplateKey, topic: Topic): Reply {
    const chosen = selectResponse(key, ctx, library, random);
    if (chosen) {
      Object.assign(ctx, chosen.context);
      return { text: chosen.text, topic };
    }
    const fallback = key === 'fallback' ? null : selectResponse('fallback', ctx, library, random);
    if (fallback) Object.assign(ctx, fallback.context);
    return { text: fallback?.text ?? BUILTIN_FALLBACK, topic, missingTemplate: key };
  }

  // Leaves the context alone: no deck or used-list bookkeeping.
  function draw(key: TemplateKey, topic: Topic): Reply {
    const templates = templatesFor(library, key);
    if (templates.length > 0) return { text: templates[Math.floor(random() * templates.length)], topic };
    const fallback = templatesFor(library, 'fallback');
    const text = fallback.length > 0 ? fallback[Math.floor(random() * fallback.length)] : BUILTIN_FALLBACK;
    return { text, topic, missingTemplate: key };
  }

  function crisisReply(): Reply {
    return { text: crisis.text(), topic: 'crisis' };
  }

  function escalate(ctx: DialogueContext, tiers: readonly string[], level: number, topic: Topic): Reply {
    const text = tiers[Math.min(level, tiers.length) - 1];
    return text ? { text, topic } : pick(ctx, 'listening', topic);
  }

  function routeIntent(ctx: DialogueContext, intent: IntentTag): Reply {
    switch (intent) {
      case 'ask_for_help_general': {
        ctx.help_count += 1;
        if (ctx.help_count >= HELP_CRISIS_THRESHOLD) return crisisReply();
        return escalate(ctx, library.escalations.help, ctx.help_count, 'listening');
      }
      case 'express_uncertainty': {
        ctx.dont_know_count += 1;
        const level = Math.min(ctx.dont_know_count, UNCERTAINTY_LEVELS);
        return escalate(ctx, library.escalations.uncertainty, level, 'listening');
      }
      case 'simple_continuation': {
        const topic = ctx.last_topic;
        return isContentTopic(topic) ? pick(ctx, CONTENT_TOPICS[topic], topic) : pick(ctx, 'listening', 'listening');
      }
      case 'unknown': {
        if (ctx.clarification_asked) return pick(ctx, 'listening', 'listening');
        ctx.clarification_asked = true;
        return pick(ctx, 'clarification', 'listening');
      }
      default: {
        const route = INTENT_ROUTES[intent];
        return route ? pick(ctx, route.key, route.topic) : pick(ctx, 'listening', 'listening');
      }
    }
  }

  function processTurn(input: string, context: DialogueContext = createContext()): TurnResult {
    const raw = String(input ?? '').trim();
    const normalized = normalizeUtterance(raw);
    const ctx = cloneContext(context);
    let route: TurnRoute;
    let intent: IntentTag | null = null;
    let reply: Reply;

    if (!normalized) {
      route = 'empty';
      reply = draw('empty', ctx.last_topic);
    } else {
      ctx.repetition_count = normalized === ctx.last_input ? ctx.repetition_count + 1 : 0;
      ctx.last_input = normalized;

      if (detectCrisis(raw, lexicon)) {
        route = 'crisis';
        reply = crisisReply();
      } else if (isOffensive(raw, lexicon)) {
        route = 'offensive';
        reply = pick(ctx, 'offensive', 'listening');
      } else if (isGibberish(raw, lexicon)) {
        route = 'gibberish';
        reply = pick(ctx, 'gibberish', 'listening');
      } else {
        intent = resolveIntent(normalized);
        if (ctx.repetition_count >= REPETITION_THRESHOLD && !ESCALATING.has(intent)) {
          route = 'repetition';
          reply = pick(ctx, 'repetition', ctx.last_topic);
        } else {
          route = 'intent';
          if (intent !== 'unknown') ctx.clarification_asked = false;
          reply = routeIntent(ctx, intent);
          if (isMeaningfulTopic(reply.topic)) {
            ctx.help_count = 0;
            ctx.dont_know_count = 0;
          }
        }
      }
    }

    ctx.last_topic = reply.topic;
    const emotion = emotionFor(reply.topic);
    const result: TurnResult = {
      response: reply.text,
      emotion,
      suggestions: suggestionsFor(reply.topic),
      context: ctx,
      topic: reply.topic,
      intent,
      route,
      record: {
        timestamp: now().toISOString(),
        input: raw,
        response: reply.text,
        topic: reply.topic,
        intent,
        emotion,
        sentiment: sentiment(raw, lexicon),
        key_phrases: keyPhrases(raw, 3, lexicon),
      },
    };
    if (reply.missingTemplate) result.missingTemplate = reply.missingTemplate;
    return result;
  }

  return { processTurn };
}

let defaultEngine: DialogueEngine | null = null;

/** Runs one turn on an engine built from the default resource files. */
export function processTurn(input: string, context?: DialogueContext): TurnResult {
  if (!defaultEngine) defaultEngine = createDialogueEngine();
  return defaultEngine.processTurn(input, context);
}
