/**
 * @fileoverview `ghj search` - interactive fuzzy search
 *
 * Keys are read from stdin in raw mode; frames are drawn on stderr in the
 * alternate screen so stdout stays free for the chosen URL.
 */

import { on } from 'node:events';
import * as readline from 'node:readline';
import { parseArgs } from 'node:util';
import { urlFor } from '../../navigation/views.js';
import { keyToInput, type KeyPress } from '../../session/keymap.js';
import { runSearchSession, type SessionInput, type SessionOutcome } from '../../session/search_session.js';
import { createError } from '../errors.js';
import { renderSessionView } from '../search_view.js';
import { withCache, type CommandContext } from './context.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const CLEAR_SCREEN = '\x1b[H\x1b[2J';

function isKeyPress(value: unknown): value is KeyPress {
  return typeof value === 'object' && value !== null;
}

/**
 * Session inputs from keypresses on `stream`. Ends when `signal` aborts.
 */
export async function* keypressInputs(stream: NodeJS.ReadableStream, signal: AbortSignal): AsyncGenerator<SessionInput> {
  try {
    for await (const [text, key] of on(stream, 'keypress', { signal })) {
      const input = keyToInput(typeof text === 'string' ? text : undefined, isKeyPress(key) ? key : undefined);
      if (input) yield input;
    }
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
}

export async function searchCommand(context: CommandContext): Promise<SessionOutcome> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      print: { type: 'boolean', default: false },
    },
    allowPositionals: false,
    strict: true,
  });

  const stdin = process.stdin;
  const screen = process.stderr;
  if (!stdin.isTTY) {
    throw createError('INVALID_ARGUMENT', 'Interactive search needs a terminal. Use `ghj query <text>` instead.');
  }

  const { config } = context;
  const controller = new AbortController();
  readline.emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  stdin.resume();
  screen.write(ENTER_ALT_SCREEN);

  let outcome: SessionOutcome;
  try {
    outcome = await withCache(config, (cache) =>
      runSearchSession(cache, keypressInputs(stdin, controller.signal), {
        halfLifeDays: config.ranking.halfLifeDays,
        nearTieBand: config.ranking.nearTieBand,
        onRender: (view) => {
          const rows = Math.min(config.ranking.visibleRows, Math.max(1, (screen.rows ?? 24) - 4));
          const lines = renderSessionView(view, { rows, width: screen.columns ?? 80 });
          screen.write(CLEAR_SCREEN + lines.join('\n'));
        },
      }),
    );
  } finally {
    controller.abort();
    screen.write(LEAVE_ALT_SCREEN);
    stdin.setRawMode(false);
    stdin.pause();
  }

  if (outcome.status === 'resolved') {
    const url = urlFor(outcome.target, outcome.view, config.webUrl);
    if (context.json) {
      context.write(JSON.stringify({ target: outcome.target, view: outcome.view, url }));
    } else if (values.print) {
      context.write(url);
    } else {
      await context.openUrl(url);
      context.write(`Opening ${url}`);
    }
  }
  return outcome;
}
