import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../shared/errors.js';
import {
  createActionSnapshot,
  createCognitionSnapshot,
  createInteractionSnapshot,
  createMessage,
  createOversightSnapshot,
  createPerceptionSnapshot,
  createRun,
  createStateSnapshot,
  createStep,
  createToolCall,
  deserializeActionSnapshot,
  deserializeCognitionSnapshot,
  deserializeInteractionSnapshot,
  deserializeMessage,
  deserializeOversightSnapshot,
  deserializePerceptionSnapshot,
  deserializeRun,
  deserializeStateSnapshot,
  deserializeStep,
  deserializeToolCall,
  entitiesEqual,
  fromJson,
  serializeActionSnapshot,
  serializeCognitionSnapshot,
  serializeInteractionSnapshot,
  serializeMessage,
  serializeOversightSnapshot,
  serializePerceptionSnapshot,
  serializeRun,
  serializeStateSnapshot,
  serializeStep,
  serializeToolCall,
  toJson,
} from '../index.js';

const T0 = '2026-03-01T10:00:00Z';

function sampleRun() {
  return createRun({
    id: 'run-42',
    name: 'research task',
    start_time: '2026-03-01T10:00:00Z',
    end_time: '2026-03-01T10:05:00Z',
    status: 'completed',
    agent: { id: 'agent-1', model: 'test-model' },
    tags: ['nightly'],
    metadata: { attempt: 2, source: { kind: 'fixture' } },
    steps: [
      {
        id: 'plan',
        name: 'plan',
        start_time: '2026-03-01T10:00:00Z',
        end_time: '2026-03-01T10:01:00Z',
        messages: [{ role: 'system', content: 'You are a researcher' }],
        cognition: {
          timestamp: '2026-03-01T10:00:30Z',
          decisions: [{ id: 'd1', summary: 'search first', confidence: 0.8 }],
          risk_assessments: [{ id: 'r1', target_id: 'd1', probability: 0.2, impact: 0.5, factors: ['rate limit'] }],
        },
        sub_steps: [
          {
            id: 'search',
            name: 'search',
            start_time: '2026-03-01T10:00:10Z',
            tool_calls: [
              { id: 'c1', name: 'web_search', input: { q: 'agents' }, output: { hits: 3 }, start_time: '2026-03-01T10:00:10Z' },
              { id: 'c2', name: 'web_fetch', input: { url: 'https://example.com' } },
            ],
            oversight: {
              timestamp: '2026-03-01T10:00:20Z',
              anomalies: [{ id: 'a1', type: 'performance', severity: 'medium', description: 'slow response' }],
              recommendations: ['add a timeout'],
            },
          },
        ],
      },
    ],
  });
}

describe('serializeRun / deserializeRun', () => {
  it('round-trips to an equal run', () => {
    const run = sampleRun();
    const restored = deserializeRun(serializeRun(run));

    expect(restored).toEqual(run);
    expect(entitiesEqual(restored, run)).toBe(true);
  });

  it('round-trips through JSON text', () => {
    const run = sampleRun();

    expect(entitiesEqual(fromJson(toJson(run)), run)).toBe(true);
  });

  it('writes canonical timestamps and omits absent optionals', () => {
    const document = serializeRun(sampleRun());

    expect(document.start_time).toBe('2026-03-01T10:00:00.000Z');
    expect(Object.hasOwn(document, 'end_time')).toBe(true);

    const minimal = serializeRun(
      createRun({ id: 'r', name: 'r', start_time: '2026-03-01T10:00:00Z', steps: [{ id: 's', name: 's', start_time: '2026-03-01T10:00:00Z', tool_calls: [{ name: 'pending' }] }] }),
    );
    expect(minimal).toEqual({
      id: 'r',
      name: 'r',
      start_time: '2026-03-01T10:00:00.000Z',
      steps: [
        {
          id: 's',
          name: 's',
          start_time: '2026-03-01T10:00:00.000Z',
          messages: [],
          tool_calls: [{ name: 'pending', input: {} }],
          sub_steps: [],
          metadata: {},
        },
      ],
      tags: [],
      metadata: {},
    });
  });

  it('produces a plain, mutable document', () => {
    const document = serializeRun(sampleRun());

    expect(Object.isFrozen(document)).toBe(false);
  });
});

describe('entity round trips', () => {
  it('round-trips a step with every layer', () => {
    const step = createStep({
      id: 'act',
      name: 'act',
      start_time: T0,
      messages: [{ role: 'user', content: 'book a table' }],
      tool_calls: [{ id: 'c1', name: 'reserve', input: { seats: 2 }, output: { ok: true } }],
      perception: { timestamp: T0, observations: [{ id: 'o1', type: 'text-message', content: 'book a table' }] },
      action: { timestamp: T0, actions: [{ id: 'c1', name: 'reserve', status: 'completed', result: { ok: true } }] },
      interaction: {
        timestamp: T0,
        messages: [{ id: 'm1', type: 'request', sender_id: 'user', recipient_id: 'agent-1', content: 'book a table' }],
      },
      state: { timestamp: T0, status: 'busy', phase: 'execution', active_tasks: ['act'] },
    });

    const document = serializeStep(step);

    expect(document.start_time).toBe('2026-03-01T10:00:00.000Z');
    expect(entitiesEqual(deserializeStep(document), step)).toBe(true);
  });

  it('round-trips messages and tool calls', () => {
    const message = createMessage({ id: 'm1', role: 'assistant', content: 'done', timestamp: T0 });
    const call = createToolCall({ name: 'lookup', input: { q: 'x' }, start_time: T0, end_time: '2026-03-01T10:00:02Z' });

    expect(serializeMessage(message)).toEqual({
      id: 'm1',
      role: 'assistant',
      content: 'done',
      timestamp: '2026-03-01T10:00:00.000Z',
    });
    expect(deserializeMessage(serializeMessage(message))).toEqual(message);
    expect(deserializeToolCall(serializeToolCall(call))).toEqual(call);
  });

  it('round-trips a perception snapshot', () => {
    const snapshot = createPerceptionSnapshot({
      timestamp: T0,
      observations: [
        { id: 'o1', type: 'text-message', content: { text: 'hi', lang: 'en' }, confidence: 0.7, metadata: { role: 'user' } },
        { id: 'o2', type: 'sensor', content: [1, 2, 3], timestamp: '2026-03-01T10:00:01Z' },
      ],
    });

    const document = serializePerceptionSnapshot(snapshot);

    expect(document.timestamp).toBe('2026-03-01T10:00:00.000Z');
    expect(deserializePerceptionSnapshot(document)).toEqual(snapshot);
  });

  it('round-trips an action snapshot', () => {
    const snapshot = createActionSnapshot({
      timestamp: T0,
      actions: [
        {
          id: 'a1',
          name: 'send_email',
          status: 'failed',
          parameters: { to: 'ops@example.com' },
          result: 'mailbox full',
          start_time: T0,
          end_time: '2026-03-01T10:00:05Z',
        },
        { id: 'a2', name: 'retry', status: 'planned' },
      ],
    });

    const document = serializeActionSnapshot(snapshot);

    expect(Object.hasOwn(document, 'actions')).toBe(true);
    expect(deserializeActionSnapshot(document)).toEqual(snapshot);
  });

  it('round-trips cognition and oversight snapshots', () => {
    const cognition = createCognitionSnapshot({
      timestamp: T0,
      decisions: [{ id: 'd1', summary: 'ask first', selected_option: { option: 'ask' } }],
    });
    const oversight = createOversightSnapshot({
      timestamp: T0,
      risks: [{ id: 'r1', name: 'cost', level: 'low', score: 0.1 }],
    });

    expect(deserializeCognitionSnapshot(serializeCognitionSnapshot(cognition))).toEqual(cognition);
    expect(deserializeOversightSnapshot(serializeOversightSnapshot(oversight))).toEqual(oversight);
  });

  it('round-trips interaction and state snapshots', () => {
    const interaction = createInteractionSnapshot({
      timestamp: T0,
      conversations: [{ id: 'conv-1', participant_ids: ['user', 'agent-1'], start_time: T0, message_count: 2 }],
      pending_messages: 1,
    });
    const state = createStateSnapshot({
      timestamp: T0,
      phase: 'planning',
      cognitive_load: 0.4,
      health_indicators: { memory: 0.9 },
    });

    expect(deserializeInteractionSnapshot(serializeInteractionSnapshot(interaction))).toEqual(interaction);
    expect(deserializeStateSnapshot(serializeStateSnapshot(state))).toEqual(state);
  });
});

describe('fromJson', () => {
  it('rejects text that is not JSON', () => {
    let caught: unknown;
    try {
      fromJson('{not json');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.kind).toBe('type_mismatch');
      expect(caught.path).toBe('');
    }
  });

  it('validates the parsed document', () => {
    expect(() => fromJson('{"id":"r","name":"r"}')).toThrow(ValidationError);
  });
});

describe('entitiesEqual', () => {
  it('compares by value', () => {
    const a = createRun({ id: 'r', name: 'r', start_time: '2026-03-01T10:00:00Z' });
    const b = createRun({ id: 'r', name: 'r', start_time: '2026-03-01T10:00:00.000Z' });
    const c = createRun({ id: 'r', name: 'other', start_time: '2026-03-01T10:00:00Z' });

    expect(entitiesEqual(a, b)).toBe(true);
    expect(entitiesEqual(a, c)).toBe(false);
  });
});
