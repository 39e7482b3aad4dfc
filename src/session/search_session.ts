/**
 * @fileoverview Interactive search state machine
 *
 * States:
 *   idle        empty query, every candidate ranked by usage
 *   filtering   non-empty query
 *   resolving   terminal: a candidate and a view were chosen
 *   cancelled   terminal: the user backed out
 *
 * Every transition is synchronous: an input updates the query or selection,
 * ranking runs inline and the render callback fires before dispatch returns.
 * The only write is the single usage event recorded when entering
 * `resolving`, which happens before the outcome is handed back.
 */

import { StorageError } from '../core/errors.js';
import {
  buildUsageIndex,
  candidateTarget,
  rankCandidates,
  toCandidates,
  DEFAULT_HALF_LIFE_DAYS,
  type Candidate,
  type RankedCandidate,
  type UsageIndex,
} from '../ranking/index.js';
import type { CacheReader, UsageRecorder } from '../storage/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { UsageTarget, ViewKind } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

export type SessionInput =
  | { type: 'insert'; text: string }
  | { type: 'delete' }
  | { type: 'clear_query' }
  | { type: 'move'; delta: number }
  | { type: 'open'; view: ViewKind }
  | { type: 'confirm' }
  | { type: 'cancel' };

export type SessionState =
  | { status: 'idle'; selection: number }
  | { status: 'filtering'; query: string; selection: number }
  | { status: 'resolving'; candidate: Candidate; target: UsageTarget; view: ViewKind }
  | { status: 'cancelled' };

export type SessionOutcome =
  | { status: 'resolved'; candidate: Candidate; target: UsageTarget; view: ViewKind }
  | { status: 'cancelled' };

export interface SessionView {
  state: SessionState;
  query: string;
  selection: number;
  results: readonly RankedCandidate[];
  totalCandidates: number;
  notice: string | null;
}

export interface SearchSessionOptions {
  now?: () => Date;
  halfLifeDays?: number;
  nearTieBand?: number;
  onRender?: (view: SessionView) => void;
}

export type SessionCache = CacheReader & UsageRecorder;

export class SearchSession {
  private readonly cache: SessionCache;
  private readonly options: SearchSessionOptions;
  private readonly candidates: Candidate[];
  private readonly usage: UsageIndex;
  private current: SessionState = { status: 'idle', selection: 0 };
  private query = '';
  private results: RankedCandidate[] = [];
  private notice: string | null = null;

  constructor(cache: SessionCache, options: SearchSessionOptions = {}) {
    this.cache = cache;
    this.options = options;
    this.candidates = this.loadCandidates();
    this.usage = this.loadUsage();
    this.results = this.rank('');
  }

  get state(): SessionState {
    return this.current;
  }

  isTerminal(): boolean {
    return this.current.status === 'resolving' || this.current.status === 'cancelled';
  }

  view(): SessionView {
    return {
      state: this.current,
      query: this.query,
      selection: this.selection(),
      results: this.results,
      totalCandidates: this.candidates.length,
      notice: this.notice,
    };
  }

  render(): void {
    this.options.onRender?.(this.view());
  }

  dispatch(input: SessionInput): SessionState {
    if (this.isTerminal()) return this.current;

    switch (input.type) {
      case 'insert':
        this.setQuery(this.query + input.text);
        break;
      case 'delete':
        this.setQuery(Array.from(this.query).slice(0, -1).join(''));
        break;
      case 'clear_query':
        this.setQuery('');
        break;
      case 'move':
        this.setSelection(this.selection() + input.delta);
        break;
      case 'open':
        this.resolve(input.view);
        break;
      case 'confirm':
        this.resolve('overview');
        break;
      case 'cancel':
        this.current = { status: 'cancelled' };
        break;
    }

    this.render();
    return this.current;
  }

  outcome(): SessionOutcome | null {
    switch (this.current.status) {
      case 'resolving':
        return {
          status: 'resolved',
          candidate: this.current.candidate,
          target: this.current.target,
          view: this.current.view,
        };
      case 'cancelled':
        return { status: 'cancelled' };
      default:
        return null;
    }
  }

  // --------------------------------------------------------------------------
  // Transitions
  // --------------------------------------------------------------------------

  private setQuery(next: string): void {
    const previousIndex = this.selection();
    const previous = previousIndex > 0 ? this.results[previousIndex]?.candidate : undefined;
    this.query = next;
    this.results = this.rank(next);
    this.notice = this.notice && this.notice.startsWith('Cache unavailable') ? this.notice : null;

    // An explicitly moved selection follows its candidate while it still matches;
    // otherwise the top result is selected.
    const followed = previous ? this.results.findIndex((entry) => entry.candidate === previous) : -1;
    this.applySelection(followed >= 0 ? followed : 0);
  }

  private setSelection(index: number): void {
    const max = Math.max(0, this.results.length - 1);
    this.applySelection(Math.min(max, Math.max(0, index)));
  }

  private applySelection(selection: number): void {
    this.current =
      this.query === ''
        ? { status: 'idle', selection }
        : { status: 'filtering', query: this.query, selection };
  }

  private resolve(view: ViewKind): void {
    const selected = this.results[this.selection()];
    if (!selected) {
      this.notice = 'Nothing selected';
      return;
    }
    const target = candidateTarget(selected.candidate);
    try {
      this.cache.recordUsage(target, view);
    } catch (error) {
      // Navigation still proceeds; the miss only affects future ranking.
      logWarning('Failed to record usage', { target: target.key, view, error: getErrorMessage(error) });
    }
    this.current = { status: 'resolving', candidate: selected.candidate, target, view };
  }

  private selection(): number {
    const state = this.current;
    return state.status === 'idle' || state.status === 'filtering' ? state.selection : 0;
  }

  // --------------------------------------------------------------------------
  // Data
  // --------------------------------------------------------------------------

  private rank(query: string): RankedCandidate[] {
    return rankCandidates(query, this.candidates, this.usage, { nearTieBand: this.options.nearTieBand });
  }

  private loadCandidates(): Candidate[] {
    try {
      return toCandidates(this.cache.queryCandidates());
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      logWarning('Cache read failed; starting with no candidates', { error: error.message });
      this.notice = `Cache unavailable: ${error.message}`;
      return [];
    }
  }

  private loadUsage(): UsageIndex {
    const now = this.options.now?.() ?? new Date();
    try {
      return buildUsageIndex(this.cache.listUsageEvents(), now, this.options.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS);
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      logWarning('Usage history unavailable; ranking by text only', { error: error.message });
      this.notice ??= `Usage history unavailable: ${error.message}`;
      return new Map();
    }
  }
}

/**
 * Drive a session from an input stream until it resolves or is cancelled.
 * An input stream that ends early counts as a cancel.
 */
export async function runSearchSession(
  cache: SessionCache,
  inputs: AsyncIterable<SessionInput>,
  options: SearchSessionOptions = {},
): Promise<SessionOutcome> {
  const session = new SearchSession(cache, options);
  session.render();
  for await (const input of inputs) {
    session.dispatch(input);
    const outcome = session.outcome();
    if (outcome) return outcome;
  }
  session.dispatch({ type: 'cancel' });
  return { status: 'cancelled' };
}
