/**
 * Canonical run schema.
 *
 * A Run owns an ordered tree of Steps. Each Step owns its messages, tool calls,
 * sub-steps and optional layer snapshots. Field names here are also the field
 * names of the serialized document.
 */

import { z } from 'zod';
import { JsonObjectSchema, type JsonObject } from '../shared/json.js';
import {
  ActionSnapshotSchema,
  CognitionSnapshotSchema,
  InteractionSnapshotSchema,
  OversightSnapshotSchema,
  PerceptionSnapshotSchema,
  StateSnapshotSchema,
  type ActionSnapshot,
  type CognitionSnapshot,
  type InteractionSnapshot,
  type OversightSnapshot,
  type PerceptionSnapshot,
  type StateSnapshot,
} from './layers.js';
import { TimestampSchema } from './timestamp.js';

/** Deepest sub-step nesting accepted by the model and walked by queries */
export const MAX_STEP_DEPTH = 256;

export const MESSAGE_ROLES = ['system', 'user', 'assistant', 'tool'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const RUN_STATUSES = ['running', 'completed', 'failed', 'cancelled', 'unknown'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

function endNotBeforeStart(
  value: { start_time?: string; end_time?: string },
  ctx: z.RefinementCtx,
): void {
  // Canonical timestamps share one fixed-width format, so string order is time order.
  if (value.start_time && value.end_time && value.end_time < value.start_time) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['end_time'],
      message: `end_time ${value.end_time} is earlier than start_time ${value.start_time}`,
      params: { kind: 'invariant_violation' },
    });
  }
}

// ─── Message ─────────────────────────────────────────────────

export const MessageSchema = z.object({
  id: z.string().optional(),
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  timestamp: TimestampSchema.optional(),
});

export type Message = z.infer<typeof MessageSchema>;

// ─── ToolCall ────────────────────────────────────────────────

export const ToolCallSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().min(1),
    input: JsonObjectSchema.default({}),
    /** Absent until the call completes */
    output: JsonObjectSchema.optional(),
    status: z.string().optional(),
    start_time: TimestampSchema.optional(),
    end_time: TimestampSchema.optional(),
  })
  .superRefine(endNotBeforeStart);

export type ToolCall = z.infer<typeof ToolCallSchema>;

// ─── Step ────────────────────────────────────────────────────

export const StepErrorSchema = z.object({
  message: z.string(),
  code: z.string().optional(),
});

export type StepError = z.infer<typeof StepErrorSchema>;

export interface Step {
  id: string;
  name: string;
  start_time: string;
  end_time?: string;
  status?: string;
  error?: StepError;
  messages: Message[];
  tool_calls: ToolCall[];
  sub_steps: Step[];
  metadata: JsonObject;
  perception?: PerceptionSnapshot;
  cognition?: CognitionSnapshot;
  action?: ActionSnapshot;
  interaction?: InteractionSnapshot;
  state?: StateSnapshot;
  oversight?: OversightSnapshot;
}

export const StepSchema: z.ZodType<Step, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    start_time: TimestampSchema,
    end_time: TimestampSchema.optional(),
    status: z.string().optional(),
    error: StepErrorSchema.optional(),
    messages: z.array(MessageSchema).default([]),
    tool_calls: z.array(ToolCallSchema).default([]),
    sub_steps: z.array(z.lazy(() => StepSchema)).default([]),
    metadata: JsonObjectSchema.default({}),
    perception: PerceptionSnapshotSchema.optional(),
    cognition: CognitionSnapshotSchema.optional(),
    action: ActionSnapshotSchema.optional(),
    interaction: InteractionSnapshotSchema.optional(),
    state: StateSnapshotSchema.optional(),
    oversight: OversightSnapshotSchema.optional(),
  })
  .superRefine(endNotBeforeStart);

// ─── Run ─────────────────────────────────────────────────────

export const AgentInfoSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  model: z.string().optional(),
});

export type AgentInfo = z.infer<typeof AgentInfoSchema>;

export const RunSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    start_time: TimestampSchema,
    end_time: TimestampSchema.optional(),
    status: z.enum(RUN_STATUSES).optional(),
    agent: AgentInfoSchema.optional(),
    steps: z.array(StepSchema).default([]),
    tags: z.array(z.string()).default([]),
    metadata: JsonObjectSchema.default({}),
  })
  .superRefine((run, ctx) => {
    endNotBeforeStart(run, ctx);

    const seen = new Set<string>();
    type Frame = { step: Step; path: Array<string | number> };
    const stack: Frame[] = run.steps.map((step, index): Frame => ({ step, path: ['steps', index] })).reverse();

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const { step, path } = frame;
      if (seen.has(step.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'id'],
          message: `Duplicate step id "${step.id}"`,
          params: { kind: 'invariant_violation' },
        });
      }
      seen.add(step.id);
      for (let index = step.sub_steps.length - 1; index >= 0; index -= 1) {
        stack.push({ step: step.sub_steps[index], path: [...path, 'sub_steps', index] });
      }
    }
  });

export type Run = z.infer<typeof RunSchema>;
