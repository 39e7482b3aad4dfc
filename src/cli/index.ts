#!/usr/bin/env node
/**
 * @fileoverview ghj CLI
 *
 * Commands:
 *   ghj [search]                  - Interactive fuzzy search
 *   ghj query <text>              - Ranked matches without the UI
 *   ghj open|issues|prs|...       - Open a view of the current repository
 *   ghj watch action              - Follow the latest CI run
 *   ghj data <subcommand>         - refresh, clear, status, export, reveal
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import { GHJUMP_VERSION } from '../index.js';
import { openInBrowser } from '../navigation/browser.js';
import { setLogLevel } from '../telemetry/logger.js';
import { dataCommand } from './commands/data.js';
import { openCommand, viewForCommand } from './commands/open.js';
import { queryCommand } from './commands/query.js';
import { searchCommand } from './commands/search.js';
import { watchCommand } from './commands/watch.js';
import type { CommandContext } from './commands/context.js';
import { createError, errorEnvelope, exitCodeFor, formatError } from './errors.js';
import { showHelp } from './help.js';

const GLOBAL_FLAGS = new Set(['--json', '--verbose']);

type Command = 'search' | 'query' | 'data' | 'watch' | 'view' | 'help';

function classify(name: string | undefined): Command | null {
  if (name === undefined) return 'search';
  switch (name) {
    case 'search':
    case 'query':
    case 'data':
    case 'watch':
    case 'help':
      return name;
    default:
      return viewForCommand(name) ? 'view' : null;
  }
}

function outputError(error: unknown, json: boolean): void {
  if (json) {
    console.error(JSON.stringify(errorEnvelope(error)));
  } else {
    console.error(formatError(error));
  }
  process.exitCode = exitCodeFor(error);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  // Global options only; each command parses its own flags strictly.
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      verbose: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const json = values.json === true;

  if (values.version === true) {
    console.log(`ghj ${GHJUMP_VERSION}`);
    return;
  }
  if (values.verbose === true) setLogLevel('debug');

  const name = positionals[0];
  const command = classify(name);
  if (values.help === true || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : name);
    return;
  }

  try {
    if (command === null) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${name ?? ''}`, { command: name });
    }

    const nameIndex = name === undefined ? argv.length : argv.indexOf(name);
    const context: CommandContext = {
      config: loadConfig(),
      cwd: process.cwd(),
      json,
      args: argv.slice(nameIndex + 1).filter((arg) => !GLOBAL_FLAGS.has(arg)),
      openUrl: (url) => openInBrowser(url),
      write: (line) => console.log(line),
    };

    switch (command) {
      case 'search':
        await searchCommand(context);
        break;
      case 'query':
        await queryCommand(context);
        break;
      case 'data':
        await dataCommand(context);
        break;
      case 'watch':
        await watchCommand(context);
        break;
      case 'view': {
        const view = viewForCommand(name ?? '');
        if (view) await openCommand(context, view);
        break;
      }
    }
  } catch (error) {
    outputError(error, json);
  }
}

main().catch((error: unknown) => {
  outputError(error, process.argv.includes('--json'));
});
