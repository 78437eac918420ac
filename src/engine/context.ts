import { z } from 'zod';
import { TEMPLATE_KEYS, TOPICS, type DialogueContext, type TemplateKey, type Topic } from './types';

export const USED_HISTORY_LIMIT = 10;

/** Topics after which the escalation counters start over. */
const QUIET_TOPICS: ReadonlySet<Topic> = new Set(['none', 'listening', 'crisis']);

export function isMeaningfulTopic(topic: Topic): boolean {
  return !QUIET_TOPICS.has(topic);
}

export function createContext(): DialogueContext {
  return {
    last_topic: 'none',
    last_input: '',
    repetition_count: 0,
    help_count: 0,
    dont_know_count: 0,
    clarification_asked: false,
    used_responses: {},
    response_decks: {},
  };
}

export function cloneContext(ctx: DialogueContext): DialogueContext {
  return {
    ...ctx,
    used_responses: cloneIndexMap(ctx.used_responses),
    response_decks: cloneIndexMap(ctx.response_decks),
  };
}

function cloneIndexMap(map: Partial<Record<TemplateKey, number[]>>): Partial<Record<TemplateKey, number[]>> {
  const out: Partial<Record<TemplateKey, number[]>> = {};
  for (const key of TEMPLATE_KEYS) {
    const list = map[key];
    if (list) out[key] = [...list];
  }
  return out;
}

const counter = z.number().int().min(0);
const indexList = z.array(z.number().int().min(0));
const indexMap = z
  .record(z.string(), indexList)
  .transform((raw) => {
    const out: Partial<Record<TemplateKey, number[]>> = {};
    for (const key of TEMPLATE_KEYS) {
      const list = raw[key];
      if (list) out[key] = list;
    }
    return out;
  });

export const DialogueContextSchema = z.object({
  last_topic: z.enum(TOPICS),
  last_input: z.string(),
  repetition_count: counter,
  help_count: counter,
  dont_know_count: counter,
  clarification_asked: z.boolean(),
  used_responses: indexMap.transform((map) => {
    for (const key of TEMPLATE_KEYS) {
      const list = map[key];
      if (list) map[key] = list.slice(-USED_HISTORY_LIMIT);
    }
    return map;
  }),
  response_decks: indexMap.default({}),
});

/** Parses a stored context; anything that does not fit the schema yields null. */
export function parseContext(raw: unknown): DialogueContext | null {
  const result = DialogueContextSchema.safeParse(raw);
  return result.success ? result.data : null;
}
