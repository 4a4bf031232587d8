import { AlertContent } from './alert.interface';

/**
 * Delivers an admissible alert. Rejects when delivery fails.
 */
export interface Notifier {
  readonly name: string;

  notify(content: AlertContent): Promise<void>;
}

export const NOTIFIER = Symbol('NOTIFIER');
