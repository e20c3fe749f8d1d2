import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDefaultRegistry } from '../../normalize/index.js';
import { NormalizationError } from '../../shared/errors.js';
import {
  flagsCommand,
  formatsCommand,
  normalizeCommand,
  registerInspectCommands,
  statsCommand,
  timelineCommand,
  treeCommand,
} from '../inspect.js';

const T0 = '2026-03-01T09:00:00Z';

const weatherTrace = {
  id: 'trace-weather',
  steps: [
    {
      id: 'step-1',
      name: 'fetch-weather',
      timestamp: T0,
      tool_calls: [{ name: 'get_weather', input: { city: 'Paris' }, output: { tempC: 18 }, timestamp: T0 }],
      messages: [{ role: 'assistant', content: 'It is 18°C in Paris', timestamp: T0 }],
    },
  ],
};

const guardedTrace = {
  id: 'trace-guarded',
  started_at: T0,
  steps: [
    {
      id: 'watch',
      name: 'watch',
      oversight: {
        anomalies: [
          { id: 'an-1', severity: 'low', description: 'chatty' },
          { id: 'an-2', severity: 'critical', description: 'leaked secret' },
        ],
      },
    },
  ],
};

function printedJson<T>(spy: { mock: { calls: unknown[][] } }): T {
  const raw = spy.mock.calls
    .map((call) => call[0])
    .find((entry): entry is string => typeof entry === 'string' && /^[[{]/.test(entry.trim()));
  if (raw === undefined) {
    throw new Error('Nothing was printed as JSON');
  }
  return JSON.parse(raw);
}

describe.sequential('inspect commands', () => {
  const registry = createDefaultRegistry();
  let cwd: string;
  let originalCwd: string;

  async function writeTrace(name: string, document: unknown): Promise<string> {
    const file = join(cwd, name);
    await writeFile(file, JSON.stringify(document), 'utf-8');
    return file;
  }

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'agent-run-inspect-'));
    originalCwd = process.cwd();
    process.chdir(cwd);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    await rm(cwd, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('normalize prints the canonical document', async () => {
    const file = await writeTrace('weather.json', weatherTrace);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await normalizeCommand(file, {}, registry);

    const document = printedJson<{ id: string; start_time: string; steps: Array<{ name: string }> }>(logSpy);
    expect(document.id).toBe('trace-weather');
    expect(document.start_time).toBe('2026-03-01T09:00:00.000Z');
    expect(document.steps.map((step) => step.name)).toEqual(['fetch-weather']);
  });

  it('timeline --json lists events in order', async () => {
    const file = await writeTrace('weather.json', weatherTrace);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await timelineCommand(file, { json: true }, registry);

    const events = printedJson<Array<{ event_kind: string }>>(logSpy);
    expect(events.map((event) => event.event_kind)).toEqual(['step_start', 'tool_call', 'message']);
  });

  it('stats --json reports aggregates', async () => {
    const file = await writeTrace('weather.json', weatherTrace);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await statsCommand(file, { json: true }, registry);

    const summary = printedJson<{ total_steps: number; total_tool_calls: number; complete: boolean }>(logSpy);
    expect(summary.total_steps).toBe(1);
    expect(summary.total_tool_calls).toBe(1);
    expect(summary.complete).toBe(false);
  });

  it('flags --json honours the minimum severity', async () => {
    const file = await writeTrace('guarded.json', guardedTrace);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await flagsCommand(file, { json: true, minSeverity: 'high' }, registry);

    const flags = printedJson<Array<{ step_id: string; severity: string }>>(logSpy);
    expect(flags).toEqual([expect.objectContaining({ step_id: 'watch', severity: 'critical' })]);
  });

  it('--format skips detection', async () => {
    const file = await writeTrace('guarded.json', guardedTrace);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await normalizeCommand(file, { format: 'agent-traces' }, registry);

    const document = printedJson<{ steps: Array<Record<string, unknown>> }>(logSpy);
    expect(Object.hasOwn(document.steps[0], 'oversight')).toBe(false);
  });

  it('tree prints every step', async () => {
    const file = await writeTrace(
      'nested.json',
      { id: 'trace-nested', started_at: T0, steps: [{ id: 'outer', name: 'outer' }, { id: 'inner', name: 'inner', parent_id: 'outer' }] },
    );
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await treeCommand(file, {}, registry);

    const lines = logSpy.mock.calls.map((call) => String(call[0] ?? ''));
    const outer = lines.findIndex((line) => line.includes('outer') && line.includes('(outer)'));
    const inner = lines.findIndex((line) => line.includes('inner') && line.includes('(inner)'));
    expect(outer).toBeGreaterThan(-1);
    expect(inner).toBeGreaterThan(outer);
    expect(lines[inner].startsWith('    - ')).toBe(true);
  });

  it('rejects files that are not JSON', async () => {
    const file = join(cwd, 'broken.json');
    await writeFile(file, '{ broken', 'utf-8');

    await expect(normalizeCommand(file, {}, registry)).rejects.toBeInstanceOf(NormalizationError);
  });

  it('formats --json lists the registry', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    formatsCommand({ json: true }, registry);

    const formats = printedJson<Array<{ id: string }>>(logSpy);
    expect(formats.map((format) => format.id)).toEqual(['agent-traces-enhanced', 'agent-traces', 'agent-events']);
  });

  describe('registerInspectCommands', () => {
    function buildProgram(): Command {
      const program = new Command().name('agent-run');
      registerInspectCommands(program, registry);
      return program;
    }

    it('wires options through to the command', async () => {
      const file = await writeTrace('guarded.json', guardedTrace);
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await buildProgram().parseAsync(['flags', file, '--json', '--min-severity', 'CRITICAL'], { from: 'user' });

      const flags = printedJson<Array<{ entity: { id: string } }>>(logSpy);
      expect(flags.map((flag) => flag.entity.id)).toEqual(['an-2']);
    });

    it('prints failures and exits non-zero', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${String(code)}`);
      });

      await expect(
        buildProgram().parseAsync(['stats', join(cwd, 'missing.json')], { from: 'user' }),
      ).rejects.toThrow('exit 1');

      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('✗');
    });
  });
});
