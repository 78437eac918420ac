import type { CrisisResponder } from './types';

export const DEFAULT_CRISIS_MESSAGE =
  "I'm really sorry you're feeling this way, and I'm glad you told me. You deserve support from a person right now. " +
  'If you are in immediate danger, please call your local emergency number. ' +
  'You can also reach out to a crisis helpline in your country, or to someone you trust, and let them know how you are feeling.';

export class StaticCrisisResponder implements CrisisResponder {
  private readonly message: string;

  constructor(message?: string) {
    const trimmed = message?.trim();
    this.message = trimmed ? trimmed : DEFAULT_CRISIS_MESSAGE;
  }

  text(): string {
    return this.message;
  }
}
