/**
 * Context Window Manager
 *
 * Keeps a conversation within a token budget as a recency-biased sliding
 * window: a leading system turn is always kept, then the newest turns
 * that fit. Turns are dropped whole, never cut mid-turn.
 */

import { estimateTokens } from '../indexer/chunker/index.js';
import type { ConversationTurn, RetrievedResult, TokenCounter } from './types.js';

/** Default token budget */
export const DEFAULT_MAX_CONTEXT_TOKENS = 4096;

export interface ContextWindowOptions {
  /** Budget for turns plus retrieved content */
  maxTokens?: number;

  /** Token counter; defaults to one token per four characters */
  tokenCounter?: TokenCounter;
}

export class ContextWindowManager {
  readonly maxTokens: number;
  private readonly count: TokenCounter;

  constructor(options: ContextWindowOptions = {}) {
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_CONTEXT_TOKENS;
    this.count = options.tokenCounter ?? estimateTokens;
  }

  /**
   * Estimated tokens of the turns plus any retrieved content.
   */
  countTokens(turns: readonly ConversationTurn[], retrieved: readonly RetrievedResult[] = []): number {
    let total = 0;
    for (const turn of turns) total += this.count(turn.content);
    for (const result of retrieved) total += this.count(result.content);
    return total;
  }

  /**
   * Drop the oldest turns until the conversation fits the budget.
   *
   * Returns the input unchanged when it already fits. A leading system
   * turn is kept even when it alone exceeds the budget.
   */
  truncate(turns: readonly ConversationTurn[], retrieved: readonly RetrievedResult[] = []): ConversationTurn[] {
    if (this.countTokens(turns, retrieved) <= this.maxTokens) {
      return [...turns];
    }

    const [first, ...others] = turns;
    const system = first?.role === 'system' ? first : undefined;
    const rest = system ? others : [...turns];

    let used = this.countTokens(system ? [system] : [], retrieved);
    const kept: ConversationTurn[] = [];

    for (let i = rest.length - 1; i >= 0; i--) {
      const turn = rest[i];
      if (!turn) continue;
      const tokens = this.count(turn.content);
      if (used + tokens > this.maxTokens) break;
      used += tokens;
      kept.push(turn);
    }

    kept.reverse();
    return system ? [system, ...kept] : kept;
  }
}
