import { z } from 'zod';

// ── Agent action ────────────────────────────────────────────

export const ANSWER_ACTION = 'ANSWER';

export const answerActionSchema = z.object({
  kind: z.literal('answer'),
  args: z.array(z.string()).nullable(),
});

export const toolCallActionSchema = z.object({
  kind: z.literal('tool'),
  name: z.string().min(1),
  args: z.array(z.string()).nullable(),
});

export const retryActionSchema = z.object({
  kind: z.literal('retry'),
  diagnostic: z.string(),
});

export const agentActionSchema = z.discriminatedUnion('kind', [
  answerActionSchema,
  toolCallActionSchema,
  retryActionSchema,
]);

export type AgentAction = z.infer<typeof agentActionSchema>;
export type AnswerAction = z.infer<typeof answerActionSchema>;
export type ToolCallAction = z.infer<typeof toolCallActionSchema>;
export type RetryAction = z.infer<typeof retryActionSchema>;

// ── Page annotation ─────────────────────────────────────────

export const boundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  text: z.string(),
  type: z.string(),
  ariaLabel: z.string(),
});

export type BoundingBox = z.infer<typeof boundingBoxSchema>;

export const boundingBoxListSchema = z.array(boundingBoxSchema);

export interface MarkedPage {
  /** Base64-encoded PNG of the page with labels drawn on it. */
  img: string;
  bboxes: BoundingBox[];
}

// ── Display ─────────────────────────────────────────────────

/** Human-readable `name: args` rendering used for progress reporting. */
export function describeAction(action: AgentAction): string {
  switch (action.kind) {
    case 'answer':
      return `${ANSWER_ACTION}: ${formatArgs(action.args)}`;
    case 'tool':
      return `${action.name}: ${formatArgs(action.args)}`;
    case 'retry':
      return `retry: ${action.diagnostic}`;
  }
}

function formatArgs(args: readonly string[] | null): string {
  if (args === null) return 'none';
  return `[${args.map((arg) => JSON.stringify(arg)).join(', ')}]`;
}
