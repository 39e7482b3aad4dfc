/**
 * @fileoverview Text rendering of a search session frame
 */

import kleur from 'kleur';
import type { SessionView } from '../session/search_session.js';

export interface RenderOptions {
  rows: number;
  width: number;
}

const HINTS = 'enter open  ^t issues  ^p pulls  ^a actions  ^g milestones  esc quit';

function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width <= 1) return chars.slice(0, Math.max(0, width)).join('');
  return chars.slice(0, width - 1).join('') + '…';
}

/** First visible row so that `selection` stays inside a window of `rows`. */
export function windowStart(selection: number, rows: number): number {
  return selection < rows ? 0 : selection - rows + 1;
}

export function renderSessionView(view: SessionView, options: RenderOptions): string[] {
  const rows = Math.max(1, options.rows);
  const width = Math.max(20, options.width);
  const lines: string[] = [`${kleur.bold().cyan('>')} ${view.query}`];

  if (view.notice) {
    lines.push(kleur.yellow(truncate(view.notice, width)));
  } else if (view.totalCandidates === 0) {
    lines.push(kleur.yellow('Cache is empty. Run `ghj data refresh` first.'));
  }

  const start = windowStart(view.selection, rows);
  const visible = view.results.slice(start, start + rows);
  visible.forEach((entry, offset) => {
    const { candidate } = entry;
    const selected = start + offset === view.selection;
    const marker = selected ? kleur.cyan('▶ ') : '  ';
    const label = candidate.kind === 'organization' ? `${candidate.fullName}/` : candidate.fullName;
    const badge = candidate.private ? ' (private)' : '';
    const room = width - 2 - Array.from(label).length - badge.length;
    const description = candidate.description && room > 4 ? `  ${truncate(candidate.description, room - 2)}` : '';
    const text = `${selected ? kleur.bold(label) : label}${kleur.magenta(badge)}${kleur.dim(description)}`;
    lines.push(marker + text);
  });

  if (view.query !== '' && view.results.length === 0 && view.totalCandidates > 0) {
    lines.push(kleur.dim('  no matches'));
  }

  lines.push(kleur.dim(`${view.results.length}/${view.totalCandidates}  ${truncate(HINTS, width - 12)}`));
  return lines;
}
