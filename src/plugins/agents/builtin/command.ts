/**
 * ABOUTME: Generic command-line agent adapter.
 * Runs any executable; the instruction goes in through {instruction},
 * {instructionFile} or stdin depending on the configured transport.
 */

import { BaseAgentAdapter } from '../base.js';
import type { AgentAdapterFactory, AgentAdapterMeta } from '../types.js';

export class CommandAgentAdapter extends BaseAgentAdapter {
  readonly meta: AgentAdapterMeta = {
    id: 'command',
    name: 'Command',
    description: 'Any command-line agent, configured by command, args and transport',
    defaultTransport: 'arg',
  };
}

const createCommandAgent: AgentAdapterFactory = () => new CommandAgentAdapter();

export default createCommandAgent;
