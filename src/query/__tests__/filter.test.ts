import { describe, expect, it } from 'vitest';
import { normalizeEnhancedAgentTrace } from '../../normalize/index.js';
import { createRun } from '../../ontology/index.js';
import { assessmentSeverity, collectByKind, collectEntities, collectFlaggedEvents } from '../filter.js';

const T0 = '2026-03-01T09:00:00Z';

function flaggedRun() {
  return normalizeEnhancedAgentTrace({
    id: 'trace-flags',
    started_at: T0,
    steps: [
      {
        id: 'plan',
        cognition: {
          risk_assessments: [{ id: 'ra-1', target_id: 'd-1', probability: 0.9, impact: 0.9 }],
        },
      },
      {
        id: 'act',
        tool_calls: [{ name: 'transfer_funds', input: { amount: 10 } }],
        sub_steps: [
          {
            id: 'watch',
            oversight: {
              anomalies: [
                { id: 'an-1', type: 'behavioral', severity: 'low', description: 'unusual phrasing' },
                { id: 'an-2', type: 'security', severity: 'high', description: 'unexpected recipient' },
              ],
              risks: [{ id: 'rk-1', name: 'financial loss', level: 'medium', score: 0.5 }],
            },
          },
        ],
      },
    ],
  });
}

describe('collectEntities', () => {
  it('visits entities in pre-order, step first', () => {
    const refs = collectEntities(flaggedRun(), () => true);

    expect(refs.map((ref) => `${ref.kind}:${ref.step_id}`)).toEqual([
      'step:plan',
      'risk_assessment:plan',
      'step:act',
      'tool_call:act',
      'action:act',
      'step:watch',
      'anomaly:watch',
      'anomaly:watch',
      'risk:watch',
    ]);
  });

  it('applies the predicate', () => {
    const refs = collectEntities(flaggedRun(), (ref) => ref.kind === 'tool_call');

    expect(refs).toHaveLength(1);
    expect(refs[0].step_id).toBe('act');
  });

  it('returns nothing for a run without steps', () => {
    expect(collectEntities(createRun({ id: 'r', name: 'r', start_time: T0 }), () => true)).toEqual([]);
  });
});

describe('collectByKind', () => {
  it('finds interaction messages', () => {
    const run = normalizeEnhancedAgentTrace({
      id: 'trace-talk',
      started_at: T0,
      steps: [
        {
          id: 'talk',
          interaction: { messages: [{ id: 'm1', type: 'notification', sender_id: 'agent', recipient_id: 'ops', content: 'done' }] },
        },
      ],
    });

    const messages = collectByKind(run, 'interaction_message');

    expect(messages.map((ref) => [ref.step_id, ref.entity.recipient_id])).toEqual([['talk', 'ops']]);
  });

  it('narrows to one entity kind', () => {
    const anomalies = collectByKind(flaggedRun(), 'anomaly');

    expect(anomalies.map((ref) => ref.entity.description)).toEqual(['unusual phrasing', 'unexpected recipient']);
  });
});

describe('assessmentSeverity', () => {
  it.each([
    [0.9, 0.9, 'critical'],
    [1, 0.5, 'high'],
    [0.5, 0.5, 'medium'],
    [0.2, 0.5, 'low'],
  ])('rates probability %d × impact %d as %s', (probability, impact, expected) => {
    expect(assessmentSeverity({ id: 'ra', target_id: 't', probability, impact, factors: [] })).toBe(expected);
  });
});

describe('collectFlaggedEvents', () => {
  it('collects anomalies, risks and risk assessments at any depth', () => {
    const flags = collectFlaggedEvents(flaggedRun());

    expect(flags.map((flag) => [flag.kind, flag.entity.id, flag.severity])).toEqual([
      ['risk_assessment', 'ra-1', 'critical'],
      ['anomaly', 'an-1', 'low'],
      ['anomaly', 'an-2', 'high'],
      ['risk', 'rk-1', 'medium'],
    ]);
  });

  it('filters by minimum severity', () => {
    const flags = collectFlaggedEvents(flaggedRun(), { minSeverity: 'high' });

    expect(flags.map((flag) => flag.entity.id)).toEqual(['ra-1', 'an-2']);
  });

  it('returns nothing when no layer reports flags', () => {
    const run = createRun({
      id: 'r',
      name: 'r',
      start_time: T0,
      steps: [{ id: 's', name: 's', start_time: T0, messages: [{ role: 'user', content: 'hi' }] }],
    });

    expect(collectFlaggedEvents(run)).toEqual([]);
  });
});
