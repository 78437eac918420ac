export const TOPICS = [
  'none',
  'stress',
  'sadness',
  'motivation',
  'anger',
  'gita',
  'calm',
  'listening',
  'crisis',
  'neutral',
] as const;

export type Topic = (typeof TOPICS)[number];

export const INTENT_TAGS = [
  'ask_for_help_general',
  'express_uncertainty',
  'ask_for_motivation_step',
  'simple_greeting',
  'simple_statement',
  'simple_continuation',
  'express_stress',
  'express_sadness',
  'express_motivation',
  'express_anger',
  'request_breathing',
  'ask_for_gita_wisdom',
  'unknown',
] as const;

export type IntentTag = (typeof INTENT_TAGS)[number];

export const EMOTION_TAGS = [
  'happy',
  'concerned',
  'empathetic',
  'encouraging',
  'calm',
  'thoughtful',
  'serious',
  'listening',
] as const;

export type EmotionTag = (typeof EMOTION_TAGS)[number];

export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export const TEMPLATE_KEYS = [
  'stress',
  'sadness',
  'motivation',
  'motivation_step',
  'anger',
  'gita',
  'calm',
  'listening',
  'neutral',
  'greeting',
  'acknowledgment',
  'clarification',
  'gibberish',
  'offensive',
  'repetition',
  'empty',
  'fallback',
] as const;

export type TemplateKey = (typeof TEMPLATE_KEYS)[number];

// Stored as-is in the session store, hence snake_case.
export type DialogueContext = {
  last_topic: Topic;
  last_input: string;
  repetition_count: number;
  help_count: number;
  dont_know_count: number;
  clarification_asked: boolean;
  used_responses: Partial<Record<TemplateKey, number[]>>;
  response_decks: Partial<Record<TemplateKey, number[]>>;
};

export type ChatTurnRecord = {
  timestamp: string;
  input: string;
  response: string;
  topic: Topic;
  intent: IntentTag | null;
  emotion: EmotionTag;
  sentiment: Sentiment;
  key_phrases: string[];
};

export type TurnRoute = 'empty' | 'crisis' | 'offensive' | 'gibberish' | 'repetition' | 'intent';

export type TurnResult = {
  response: string;
  emotion: EmotionTag;
  suggestions: string[];
  context: DialogueContext;
  topic: Topic;
  intent: IntentTag | null;
  route: TurnRoute;
  record: ChatTurnRecord;
  /** Set when the resolved template set was empty and a fallback was used. */
  missingTemplate?: TemplateKey;
};

export type CrisisResponder = {
  text(): string;
};
