/**
 * ABOUTME: Template system exports for instruction rendering.
 */

export type { InstructionVariables, TemplateLoadResult, TemplateRenderResult } from './types.js';

export type { InstructionInput } from './engine.js';

export {
  USER_TEMPLATE_FILE,
  buildInstructionVariables,
  clearTemplateCache,
  getUserConfigDir,
  getUserTemplatePath,
  loadTemplate,
  renderInstruction,
  renderTemplate,
} from './engine.js';

export { DEFAULT_TEMPLATE } from './builtin.js';
