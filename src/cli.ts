#!/usr/bin/env node

/**
 * agent-run CLI
 *
 * Normalize agent trace files into the canonical run ontology and inspect them.
 *
 * Usage:
 *   agent-run normalize <file>        Print the canonical JSON form
 *   agent-run tree <file>             Print the step tree
 *   agent-run timeline <file>         Print the chronological timeline
 *   agent-run stats <file>            Print aggregate counts
 *   agent-run flags <file>            List anomalies and risks
 *   agent-run formats                 List supported trace formats
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerInspectCommands } from './commands/inspect.js';
import { createDefaultRegistry } from './normalize/index.js';
import { setLogLevel } from './shared/logger.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('agent-run')
  .description('Normalize agent execution traces and query them.')
  .version(version)
  .option('-v, --verbose', 'Log format detection and normalization details')
  .hook('preAction', (command) => {
    if (command.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug');
    }
  });

registerInspectCommands(program, createDefaultRegistry());

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
