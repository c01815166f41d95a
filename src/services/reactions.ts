import { loadReactionTriggers, type ReactionTrigger } from '../config/data-tables.js';

export interface ReactionPickerOptions {
  triggers?: ReactionTrigger[];
  /** Uniform in [0, 1). @default Math.random */
  random?: () => number;
}

interface CompiledTrigger extends ReactionTrigger {
  pattern: RegExp;
}

/**
 * Emoji reactions to room chatter. Each trigger phrase that appears as a whole
 * word gets one roll against its chance; the first roll that lands picks one
 * of that trigger's emojis. At most one reaction per message.
 */
export class ReactionPicker {
  readonly #triggers: CompiledTrigger[];
  readonly #random: () => number;

  constructor(options: ReactionPickerOptions = {}) {
    this.#random = options.random ?? Math.random;
    this.#triggers = (options.triggers ?? loadReactionTriggers()).map((trigger) => ({
      ...trigger,
      pattern: new RegExp(
        `(?<![\\p{L}\\p{N}])${trigger.phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}(?![\\p{L}\\p{N}])`,
        'iu',
      ),
    }));
  }

  pick(text: string): string | null {
    for (const trigger of this.#triggers) {
      if (!trigger.pattern.test(text)) continue;
      if (this.#random() >= trigger.chance) continue;
      const index = Math.min(trigger.emojis.length - 1, Math.floor(this.#random() * trigger.emojis.length));
      return trigger.emojis[index] ?? null;
    }
    return null;
  }
}
