/**
 * ABOUTME: Codex CLI agent adapter.
 * Runs `codex exec` with JSONL output against the workspace.
 */

import { BaseAgentAdapter, type ArgContext } from '../base.js';
import type { AgentAdapterFactory, AgentAdapterMeta } from '../types.js';

export class CodexAgentAdapter extends BaseAgentAdapter {
  readonly meta: AgentAdapterMeta = {
    id: 'codex',
    name: 'Codex',
    description: 'OpenAI Codex CLI in exec mode',
    defaultCommand: 'codex',
    defaultTransport: 'arg',
  };

  protected override getDefaultArgs(context: ArgContext): string[] {
    const args = ['exec', '--dangerously-bypass-approvals-and-sandbox', '--json', '-C', context.workspace];
    if (context.model) {
      args.push('-m', context.model);
    }
    return args;
  }
}

const createCodexAgent: AgentAdapterFactory = () => new CodexAgentAdapter();

export default createCodexAgent;
