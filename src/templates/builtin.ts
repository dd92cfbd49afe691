/**
 * ABOUTME: Built-in instruction template, bundled with the package.
 */

/**
 * Default template used when no custom template is configured.
 */
export const DEFAULT_TEMPLATE = `# Task {{taskId}}{{#if taskName}}: {{taskName}}{{/if}}

{{instructions}}

{{#if taskMd}}
## TASK.md
{{taskMd}}
{{/if}}

{{#if feedback}}
## Feedback From Iteration {{previousIteration}}
The workspace was verified after your previous attempt and did not pass yet.

{{feedback}}
{{/if}}

{{#if recentProgress}}
{{recentProgress}}
{{/if}}

## Instructions
This is iteration {{iteration}} of {{maxIterations}}. About {{remainingSeconds}}s of the time budget remain.
Work in the current directory. Make the changes the task asks for directly in the files.

When the task is complete, signal completion with:
<promise>COMPLETE</promise>
`;
