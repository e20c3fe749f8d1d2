/**
 * agent-run inspect commands: normalize a trace file and print derived views.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type AgentRunConfig } from '../config.js';
import { SEVERITY_LEVELS, toJson, type Run, type Severity, type Step } from '../ontology/index.js';
import type { NormalizerRegistry } from '../normalize/index.js';
import {
  collectFlaggedEvents,
  extractTimeline,
  METRIC_NAMES,
  summarizeRun,
  type TimelineEventKind,
} from '../query/index.js';
import { NormalizationError } from '../shared/errors.js';

export interface TraceOptions {
  format?: string;
}

export interface JsonOutputOptions extends TraceOptions {
  json?: boolean;
}

export interface FlagsOptions extends JsonOutputOptions {
  minSeverity?: Severity;
}

export interface LoadedTrace {
  run: Run;
  format: string;
  config: AgentRunConfig;
}

/**
 * Read a trace file and normalize it. The format comes from `--format`,
 * else detection, else the configured default.
 */
export async function loadTrace(
  file: string,
  options: TraceOptions,
  registry: NormalizerRegistry,
): Promise<LoadedTrace> {
  const config = await loadConfig();
  const text = await readFile(resolve(file), 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new NormalizationError('unrecognized_shape', `Trace file is not valid JSON: ${file}`, '', undefined, {
      cause: err,
    });
  }

  const format = options.format ?? registry.detect(document) ?? config.defaultFormat;
  return { run: registry.normalize(format, document), format, config };
}

export async function normalizeCommand(file: string, options: TraceOptions, registry: NormalizerRegistry): Promise<void> {
  const { run } = await loadTrace(file, options, registry);
  console.log(toJson(run));
}

function printStep(step: Step, indent: number): void {
  const prefix = ' '.repeat(indent);
  const end = step.end_time ? '' : chalk.yellow(' (open)');
  console.log(`${prefix}- ${chalk.bold(step.name)} ${chalk.dim(`(${step.id})`)}${end}`);
  for (const call of step.tool_calls) {
    console.log(`${prefix}  ${chalk.magenta(`tool[${call.name}]`)}`);
  }
  for (const message of step.messages) {
    console.log(`${prefix}  ${chalk.cyan(`message[${message.role}]`)}: ${message.content}`);
  }
}

export async function treeCommand(file: string, options: TraceOptions, registry: NormalizerRegistry): Promise<void> {
  const { run, format } = await loadTrace(file, options, registry);

  console.log();
  console.log(chalk.bold(`🧭 Run: ${chalk.cyan(run.id)}`) + chalk.dim(`  ${run.name} [${format}]`));
  console.log();

  const stack: Array<{ step: Step; indent: number }> = [...run.steps]
    .reverse()
    .map((step) => ({ step, indent: 2 }));
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    printStep(next.step, next.indent);
    for (let index = next.step.sub_steps.length - 1; index >= 0; index -= 1) {
      stack.push({ step: next.step.sub_steps[index], indent: next.indent + 2 });
    }
  }

  console.log();
}

const KIND_COLORS: Record<TimelineEventKind, (text: string) => string> = {
  step_start: chalk.green,
  step_end: chalk.green,
  message: chalk.cyan,
  tool_call: chalk.magenta,
  tool_result: chalk.magenta,
};

export async function timelineCommand(
  file: string,
  options: JsonOutputOptions,
  registry: NormalizerRegistry,
): Promise<void> {
  const { run, config } = await loadTrace(file, options, registry);
  const events = extractTimeline(run, { includeStepEnd: config.timeline.includeStepEnd });

  if (options.json) {
    console.log(JSON.stringify(events, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`🕒 Timeline: ${chalk.cyan(run.id)}`));
  console.log(chalk.dim(`   ${events.length} event${events.length === 1 ? '' : 's'}`));
  console.log();

  for (const event of events) {
    const kind = KIND_COLORS[event.event_kind](event.event_kind.padEnd(11));
    console.log(`  ${chalk.dim(event.timestamp)}  ${kind}  ${'  '.repeat(event.depth)}${event.payload_summary}`);
  }

  console.log();
}

export async function statsCommand(file: string, options: JsonOutputOptions, registry: NormalizerRegistry): Promise<void> {
  const { run } = await loadTrace(file, options, registry);
  const summary = summarizeRun(run);

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`📊 Stats: ${chalk.cyan(run.id)}`));
  console.log();

  const width = Math.max(...METRIC_NAMES.map((name) => name.length));
  for (const name of METRIC_NAMES) {
    console.log(`  ${name.padEnd(width)}  ${summary[name]}`);
  }
  console.log(`  ${'duration_ms'.padEnd(width)}  ${summary.duration_ms ?? chalk.dim('n/a')}`);
  console.log(`  ${'complete'.padEnd(width)}  ${summary.complete ? chalk.green('yes') : chalk.yellow('no')}`);
  console.log();
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  low: chalk.dim,
  medium: chalk.yellow,
  high: chalk.red,
  critical: chalk.bgRed.white,
};

export async function flagsCommand(file: string, options: FlagsOptions, registry: NormalizerRegistry): Promise<void> {
  const { run, config } = await loadTrace(file, options, registry);
  const flags = collectFlaggedEvents(run, { minSeverity: options.minSeverity ?? config.flags.minSeverity });

  if (options.json) {
    console.log(JSON.stringify(flags, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`🚩 Flagged events: ${chalk.cyan(run.id)}`));
  console.log();

  if (flags.length === 0) {
    console.log(chalk.dim('  No anomalies or risks reported.'));
    console.log();
    return;
  }

  for (const flag of flags) {
    const severity = SEVERITY_COLORS[flag.severity](flag.severity.padEnd(8));
    const label = flag.kind === 'risk' ? flag.entity.name : flag.kind === 'anomaly' ? flag.entity.description : flag.entity.target_id;
    console.log(`  ${severity}  ${chalk.yellow(flag.kind.padEnd(15))}  ${chalk.dim(flag.step_id)}  ${label}`);
  }

  console.log();
}

export function formatsCommand(options: { json?: boolean }, registry: NormalizerRegistry): void {
  const formats = registry.list();
  if (options.json) {
    console.log(JSON.stringify(formats, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold('📦 Trace formats'));
  console.log();
  for (const format of formats) {
    console.log(`  ${chalk.cyan(format.id)}  ${chalk.dim(format.description)}`);
  }
  console.log();
}

/**
 * Print a failed command's error and exit non-zero.
 */
export function handleCommandError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`✗ ${message}`));
  process.exit(1);
}

function handled<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      handleCommandError(err);
    }
  };
}

function parseSeverity(value: string): Severity {
  const severity = SEVERITY_LEVELS.find((level) => level === value.toLowerCase());
  if (!severity) {
    throw new Error(`Unknown severity "${value}" (expected low, medium, high or critical)`);
  }
  return severity;
}

export function registerInspectCommands(program: Command, registry: NormalizerRegistry): void {
  program
    .command('normalize <file>')
    .description('Print the canonical JSON form of a trace file')
    .option('--format <id>', 'Trace format (default: auto-detect)')
    .action(handled((file: string, options: TraceOptions) => normalizeCommand(file, options, registry)));

  program
    .command('tree <file>')
    .description('Print the step tree of a trace file')
    .option('--format <id>', 'Trace format (default: auto-detect)')
    .action(handled((file: string, options: TraceOptions) => treeCommand(file, options, registry)));

  program
    .command('timeline <file>')
    .description('Print the chronological event timeline')
    .option('--format <id>', 'Trace format (default: auto-detect)')
    .option('--json', 'Output as JSON')
    .action(handled((file: string, options: JsonOutputOptions) => timelineCommand(file, options, registry)));

  program
    .command('stats <file>')
    .description('Print aggregate counts for a run')
    .option('--format <id>', 'Trace format (default: auto-detect)')
    .option('--json', 'Output as JSON')
    .action(handled((file: string, options: JsonOutputOptions) => statsCommand(file, options, registry)));

  program
    .command('flags <file>')
    .description('List anomalies and risks reported anywhere in the run')
    .option('--format <id>', 'Trace format (default: auto-detect)')
    .option('--min-severity <level>', 'Only show flags at or above this severity', parseSeverity)
    .option('--json', 'Output as JSON')
    .action(handled((file: string, options: FlagsOptions) => flagsCommand(file, options, registry)));

  program
    .command('formats')
    .description('List supported trace formats')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => formatsCommand(options, registry));
}
