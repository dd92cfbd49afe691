/**
 * ABOUTME: Aider agent adapter.
 * One-shot aider run per iteration; loopbench owns the commits, so aider's are off.
 */

import { BaseAgentAdapter, type ArgContext } from '../base.js';
import type { AgentAdapterFactory, AgentAdapterMeta } from '../types.js';

export class AiderAgentAdapter extends BaseAgentAdapter {
  readonly meta: AgentAdapterMeta = {
    id: 'aider',
    name: 'Aider',
    description: 'Aider in single-message mode',
    defaultCommand: 'aider',
    defaultTransport: 'file',
  };

  protected override getDefaultArgs(context: ArgContext): string[] {
    const args = ['--yes-always', '--no-auto-commits', '--no-pretty'];
    if (context.model) {
      args.push('--model', context.model);
    }
    args.push('--message-file', '{instructionFile}');
    return args;
  }
}

const createAiderAgent: AgentAdapterFactory = () => new AiderAgentAdapter();

export default createAiderAgent;
