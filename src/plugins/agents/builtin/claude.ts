/**
 * ABOUTME: Claude Code agent adapter.
 * Runs the claude CLI in print mode with JSON output so the run's cost
 * (total_cost_usd) lands in the usage counter.
 */

import { BaseAgentAdapter, type ArgContext } from '../base.js';
import type { AgentAdapterFactory, AgentAdapterMeta } from '../types.js';

export class ClaudeAgentAdapter extends BaseAgentAdapter {
  readonly meta: AgentAdapterMeta = {
    id: 'claude',
    name: 'Claude Code',
    description: 'Anthropic Claude Code CLI in non-interactive print mode',
    defaultCommand: 'claude',
    defaultTransport: 'stdin',
  };

  protected override getDefaultArgs(context: ArgContext): string[] {
    const args = ['--print', '--output-format', 'json', '--dangerously-skip-permissions'];
    const maxTurns = this.config?.options?.['maxTurns'];
    if (typeof maxTurns === 'number') {
      args.push('--max-turns', String(maxTurns));
    }
    if (context.model) {
      args.push('--model', context.model);
    }
    return args;
  }
}

const createClaudeAgent: AgentAdapterFactory = () => new ClaudeAgentAdapter();

export default createClaudeAgent;
