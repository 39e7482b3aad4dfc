/**
 * @fileoverview `ghj open|issues|prs|actions|milestones|settings` for the current repository
 */

import { parseArgs } from 'node:util';
import { hostOf, resolveCurrentRepository } from '../../github/remote.js';
import { urlFor } from '../../navigation/views.js';
import type { ViewKind } from '../../types.js';
import type { CommandContext } from './context.js';

export const VIEW_COMMANDS: Readonly<Record<string, ViewKind>> = {
  open: 'overview',
  issues: 'issues',
  prs: 'pulls',
  pulls: 'pulls',
  actions: 'actions',
  milestones: 'milestones',
  settings: 'settings',
};

export function viewForCommand(command: string): ViewKind | null {
  return Object.prototype.hasOwnProperty.call(VIEW_COMMANDS, command) ? VIEW_COMMANDS[command] ?? null : null;
}

export async function openCommand(context: CommandContext, view: ViewKind): Promise<void> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      print: { type: 'boolean', default: false },
    },
    allowPositionals: false,
    strict: true,
  });

  const { config } = context;
  const repository = await resolveCurrentRepository(context.cwd, hostOf(config.webUrl));
  const url = urlFor({ kind: 'repository', key: repository.fullName }, view, config.webUrl);

  if (values.print || context.json) {
    context.write(context.json ? JSON.stringify({ repository: repository.fullName, view, url }) : url);
    return;
  }
  await context.openUrl(url);
  context.write(`Opening ${url}`);
}
