/**
 * ABOUTME: Type definitions for the instruction template system.
 */

/**
 * Variables available to instruction templates.
 */
export interface InstructionVariables {
  taskId: string;

  /** Task display name, empty when the task has none */
  taskName: string;

  /** Task prompt from the run configuration */
  instructions: string;

  /** Contents of TASK.md in the workspace, empty when absent */
  taskMd: string;

  /** 1-based iteration about to run */
  iteration: number;

  maxIterations: number;

  /** Whole seconds left in the run's time budget */
  remainingSeconds: number;

  /** Rendered verification failure of the previous iteration, empty on iteration 1 */
  feedback: string;

  /** Iteration the feedback came from (0 when there is none) */
  previousIteration: number;

  /** Recent progress summary from previous iterations */
  recentProgress: string;

  agentName: string;

  /** Model configured for the agent, empty when unset */
  model: string;

  workspace: string;

  /** Current date in ISO format */
  currentDate: string;

  /** Current timestamp in ISO format */
  currentTimestamp: string;
}

/**
 * Result of loading a template.
 */
export interface TemplateLoadResult {
  success: boolean;
  content?: string;
  /** File path, or `builtin:default` */
  source: string;
  error?: string;
}

/**
 * Result of rendering an instruction.
 */
export interface TemplateRenderResult {
  success: boolean;
  instruction?: string;
  source: string;
  error?: string;
}
