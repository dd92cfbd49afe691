/**
 * ABOUTME: Pluggable completion detection strategies.
 * Decides whether an agent's output claims the task is done. Only consulted
 * when no verification command is configured.
 */

import type { AgentInvocationResult } from '../plugins/agents/types.js';

type CompletionInput = Pick<AgentInvocationResult, 'stdout' | 'exitCode' | 'classification'>;

export interface CompletionStrategy {
  name: CompletionStrategyName;
  detect(result: CompletionInput): boolean;
}

/**
 * Explicit <promise>COMPLETE</promise> tag.
 */
export const promiseTagStrategy: CompletionStrategy = {
  name: 'promise-tag',
  detect(result) {
    return /<promise>\s*COMPLETE\s*<\/promise>/i.test(result.stdout);
  },
};

/**
 * Relaxed tag strategy: catches common agent mutations like
 * wrapping in code fences, adding quotes, or slight formatting changes.
 */
export const relaxedTagStrategy: CompletionStrategy = {
  name: 'relaxed-tag',
  detect(result) {
    return /<promise>\s*COMPLETE\s*<\/promise>/i.test(result.stdout) ||
      /\bpromise\s*:\s*complete\b/i.test(result.stdout);
  },
};

/**
 * Completion language in the last lines of output plus exit code 0.
 */
export const heuristicStrategy: CompletionStrategy = {
  name: 'heuristic',
  detect(result) {
    if (result.exitCode !== 0) return false;
    const tail = result.stdout.slice(-500).toLowerCase();
    const completionPhrases = [
      'all acceptance criteria met',
      'all tasks complete',
      'implementation complete',
      'all checks pass',
    ];
    return completionPhrases.some(phrase => tail.includes(phrase));
  },
};

/**
 * A clean exit counts as done.
 */
export const exitCodeStrategy: CompletionStrategy = {
  name: 'exit-code',
  detect(result) {
    return result.classification === 'completed';
  },
};

export const COMPLETION_STRATEGY_NAMES = ['promise-tag', 'relaxed-tag', 'heuristic', 'exit-code'] as const;

export type CompletionStrategyName = (typeof COMPLETION_STRATEGY_NAMES)[number];

export const DEFAULT_COMPLETION_STRATEGIES: readonly CompletionStrategyName[] = ['promise-tag', 'exit-code'];

const strategyMap: Record<CompletionStrategyName, CompletionStrategy> = {
  'promise-tag': promiseTagStrategy,
  'relaxed-tag': relaxedTagStrategy,
  'heuristic': heuristicStrategy,
  'exit-code': exitCodeStrategy,
};

/**
 * Run strategies in order, return true on first match.
 */
export function detectCompletion(
  result: CompletionInput,
  strategies: readonly CompletionStrategyName[] = DEFAULT_COMPLETION_STRATEGIES,
): { completed: boolean; matchedStrategy: CompletionStrategyName | null } {
  for (const name of strategies) {
    if (strategyMap[name].detect(result)) {
      return { completed: true, matchedStrategy: name };
    }
  }
  return { completed: false, matchedStrategy: null };
}
