/**
 * Layer snapshots for the extended ontology.
 *
 * A step opts in to a layer by carrying its snapshot. An absent snapshot means
 * the layer was not reported, which is not the same as an empty one.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema } from '../shared/json.js';
import { TimestampSchema } from './timestamp.js';

const UnitIntervalSchema = z.number().min(0).max(1);

export const SEVERITY_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export const SeveritySchema = z.enum(SEVERITY_LEVELS);
export type Severity = z.infer<typeof SeveritySchema>;

// ─── Perception ──────────────────────────────────────────────

export const ObservationSchema = z.object({
  id: z.string().min(1),
  /** Observation type, e.g. "text-message" */
  type: z.string(),
  content: JsonValueSchema,
  confidence: UnitIntervalSchema.default(1),
  timestamp: TimestampSchema.optional(),
  metadata: JsonObjectSchema.default({}),
});

export type Observation = z.infer<typeof ObservationSchema>;

export const PerceptionSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  observations: z.array(ObservationSchema).default([]),
});

export type PerceptionSnapshot = z.infer<typeof PerceptionSnapshotSchema>;

// ─── Cognition ───────────────────────────────────────────────

export const DecisionSchema = z.object({
  id: z.string().min(1),
  summary: z.string(),
  selected_option: JsonValueSchema.optional(),
  confidence: UnitIntervalSchema.default(1),
  timestamp: TimestampSchema.optional(),
  justification: z.string().optional(),
});

export type Decision = z.infer<typeof DecisionSchema>;

export const RiskAssessmentSchema = z.object({
  id: z.string().min(1),
  /** Decision or plan the assessment refers to */
  target_id: z.string(),
  probability: UnitIntervalSchema,
  impact: UnitIntervalSchema,
  factors: z.array(z.string()).default([]),
});

export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

export const CognitionSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  decisions: z.array(DecisionSchema).default([]),
  risk_assessments: z.array(RiskAssessmentSchema).default([]),
});

export type CognitionSnapshot = z.infer<typeof CognitionSnapshotSchema>;

// ─── Action ──────────────────────────────────────────────────

export const ACTION_STATUSES = ['planned', 'executing', 'completed', 'failed', 'cancelled'] as const;

export const ActionExecutionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    status: z.enum(ACTION_STATUSES),
    parameters: JsonObjectSchema.default({}),
    result: JsonValueSchema.optional(),
    start_time: TimestampSchema.optional(),
    end_time: TimestampSchema.optional(),
  })
  .superRefine((action, ctx) => {
    if (action.start_time && action.end_time && action.end_time < action.start_time) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_time'],
        message: 'end_time is earlier than start_time',
        params: { kind: 'invariant_violation' },
      });
    }
  });

export type ActionExecution = z.infer<typeof ActionExecutionSchema>;

export const ActionSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  actions: z.array(ActionExecutionSchema).default([]),
});

export type ActionSnapshot = z.infer<typeof ActionSnapshotSchema>;

// ─── Oversight ───────────────────────────────────────────────

export const AnomalySchema = z.object({
  id: z.string().min(1),
  /** Anomaly category, e.g. "behavioral" or "performance" */
  type: z.string(),
  severity: SeveritySchema,
  description: z.string(),
  detected_at: TimestampSchema.optional(),
});

export type Anomaly = z.infer<typeof AnomalySchema>;

export const RiskSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  level: SeveritySchema,
  score: UnitIntervalSchema,
});

export type Risk = z.infer<typeof RiskSchema>;

export const OversightSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  anomalies: z.array(AnomalySchema).default([]),
  risks: z.array(RiskSchema).default([]),
  recommendations: z.array(z.string()).default([]),
});

export type OversightSnapshot = z.infer<typeof OversightSnapshotSchema>;

// ─── Interaction ─────────────────────────────────────────────

export const INTERACTION_MESSAGE_TYPES = [
  'request',
  'response',
  'notification',
  'command',
  'query',
  'update',
  'error',
  'acknowledgment',
] as const;

export const InteractionMessageSchema = z.object({
  id: z.string().min(1),
  type: z.enum(INTERACTION_MESSAGE_TYPES),
  sender_id: z.string(),
  recipient_id: z.string(),
  content: JsonValueSchema,
  timestamp: TimestampSchema.optional(),
  correlation_id: z.string().optional(),
  reply_to: z.string().optional(),
});

export type InteractionMessage = z.infer<typeof InteractionMessageSchema>;

export const ConversationSchema = z
  .object({
    id: z.string().min(1),
    participant_ids: z.array(z.string()).default([]),
    start_time: TimestampSchema.optional(),
    end_time: TimestampSchema.optional(),
    message_count: z.number().int().nonnegative().default(0),
    status: z.string().default('active'),
    topic: z.string().optional(),
  })
  .superRefine((conversation, ctx) => {
    if (conversation.start_time && conversation.end_time && conversation.end_time < conversation.start_time) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_time'],
        message: 'end_time is earlier than start_time',
        params: { kind: 'invariant_violation' },
      });
    }
  });

export type Conversation = z.infer<typeof ConversationSchema>;

export const InteractionSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  messages: z.array(InteractionMessageSchema).default([]),
  conversations: z.array(ConversationSchema).default([]),
  pending_messages: z.number().int().nonnegative().default(0),
});

export type InteractionSnapshot = z.infer<typeof InteractionSnapshotSchema>;

// ─── State ───────────────────────────────────────────────────

export const AGENT_STATUSES = [
  'initializing',
  'ready',
  'active',
  'busy',
  'paused',
  'error',
  'shutting-down',
  'terminated',
] as const;

export const EXECUTION_PHASES = [
  'perception',
  'reasoning',
  'planning',
  'execution',
  'monitoring',
  'learning',
  'idle',
] as const;

export const StateSnapshotSchema = z.object({
  timestamp: TimestampSchema,
  status: z.enum(AGENT_STATUSES).optional(),
  phase: z.enum(EXECUTION_PHASES).optional(),
  health_score: UnitIntervalSchema.default(1),
  /** Cognitive load, 0 idle to 1 saturated */
  cognitive_load: UnitIntervalSchema.default(0),
  active_tasks: z.array(z.string()).default([]),
  attention_focus: z.array(z.string()).default([]),
  working_memory: z.array(z.string()).default([]),
  active_goals: z.array(z.string()).default([]),
  health_indicators: z.record(z.string(), z.number().finite()).default({}),
});

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

export const LAYER_NAMES = ['perception', 'cognition', 'action', 'interaction', 'state', 'oversight'] as const;
export type LayerName = (typeof LAYER_NAMES)[number];
