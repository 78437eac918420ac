import type { EmotionTag, Topic } from './types';

const EMOTIONS: Partial<Record<Topic, EmotionTag>> = {
  stress: 'concerned',
  sadness: 'empathetic',
  motivation: 'encouraging',
  anger: 'calm',
  gita: 'thoughtful',
  calm: 'calm',
  crisis: 'serious',
  neutral: 'happy',
};

const SUGGESTIONS: Record<Topic, readonly string[]> = {
  none: ['I feel stressed', 'I feel sad', 'I need motivation', 'Share some Gita wisdom'],
  stress: ['Can we do a breathing exercise?', 'What should I do first?', 'I feel overwhelmed'],
  sadness: ['I feel lonely', 'Tell me something hopeful', 'Can we do a breathing exercise?'],
  motivation: ['Give me a first step', 'Share some Gita wisdom', 'I keep procrastinating'],
  anger: ['Help me calm down', 'I feel frustrated', 'Share some Gita wisdom'],
  gita: ['Tell me more', 'What does karma mean?', 'I need motivation'],
  calm: ['Let’s do another breathing exercise', 'I feel better', 'Tell me more'],
  listening: ['I feel stressed', 'I feel sad', 'I need motivation', 'Can we do a breathing exercise?'],
  crisis: ['I need to talk to someone', 'Can we do a breathing exercise?'],
  neutral: ['I feel stressed', 'I feel sad', 'I need motivation', 'Share some Gita wisdom'],
};

export function emotionFor(topic: Topic): EmotionTag {
  return EMOTIONS[topic] ?? 'listening';
}

export function suggestionsFor(topic: Topic): string[] {
  return SUGGESTIONS[topic].slice(0, 4);
}
