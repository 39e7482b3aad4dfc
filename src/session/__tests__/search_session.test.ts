import { describe, it, expect } from 'vitest';
import { runSearchSession, SearchSession, type SessionInput, type SessionView } from '../search_session.js';
import { cachedRepo, FETCHED_AT, MemoryCache, org } from '../../__tests__/helpers/fixtures.js';

function cache(): MemoryCache {
  return new MemoryCache({
    organizations: [org(10, 'frankwiles')],
    repositories: [cachedRepo(1, 'frankwiles/gg', { ownerId: 10 }), cachedRepo(2, 'frankwiles/blog', { ownerId: 10 })],
  });
}

const names = (view: SessionView): string[] => view.results.map((entry) => entry.candidate.fullName);

async function* inputs(...items: SessionInput[]): AsyncGenerator<SessionInput> {
  for (const item of items) yield item;
}

describe('SearchSession', () => {
  it('starts idle with every candidate ranked', () => {
    const session = new SearchSession(cache(), { now: () => FETCHED_AT });

    expect(session.state).toEqual({ status: 'idle', selection: 0 });
    expect(names(session.view())).toEqual(['frankwiles', 'frankwiles/blog', 'frankwiles/gg']);
    expect(session.view().totalCandidates).toBe(3);
  });

  it('puts recently used candidates first for an empty query', () => {
    const memory = cache();
    memory.seedUsage({ kind: 'repository', id: 1, key: 'frankwiles/gg' }, FETCHED_AT);

    const session = new SearchSession(memory, { now: () => FETCHED_AT });

    expect(names(session.view())).toEqual(['frankwiles/gg', 'frankwiles', 'frankwiles/blog']);
  });

  it('filters as the query grows and shrinks', () => {
    const session = new SearchSession(cache());

    session.dispatch({ type: 'insert', text: 'g' });
    expect(session.state).toEqual({ status: 'filtering', query: 'g', selection: 0 });
    expect(names(session.view())).toEqual(['frankwiles/gg', 'frankwiles/blog']);

    session.dispatch({ type: 'insert', text: 'g' });
    expect(names(session.view())).toEqual(['frankwiles/gg']);

    session.dispatch({ type: 'clear_query' });
    expect(session.state).toEqual({ status: 'idle', selection: 0 });
    expect(session.view().results).toHaveLength(3);
  });

  it('clamps the selection to the result list', () => {
    const session = new SearchSession(cache());

    session.dispatch({ type: 'move', delta: -1 });
    expect(session.view().selection).toBe(0);

    session.dispatch({ type: 'move', delta: 10 });
    expect(session.view().selection).toBe(2);
  });

  it('keeps a moved selection on its candidate while it still matches', () => {
    const session = new SearchSession(cache());
    session.dispatch({ type: 'insert', text: 'g' });
    session.dispatch({ type: 'move', delta: 1 });
    expect(session.view().results[1]?.candidate.fullName).toBe('frankwiles/blog');

    session.dispatch({ type: 'delete' });

    expect(session.state).toEqual({ status: 'idle', selection: 1 });
    expect(names(session.view())[1]).toBe('frankwiles/blog');
  });

  it('resolves the selected candidate and records one usage event', () => {
    const memory = cache();
    const session = new SearchSession(memory);
    session.dispatch({ type: 'insert', text: 'g' });

    session.dispatch({ type: 'confirm' });

    expect(session.outcome()).toMatchObject({
      status: 'resolved',
      target: { kind: 'repository', id: 1, key: 'frankwiles/gg' },
      view: 'overview',
    });
    expect(memory.events.map((event) => [event.target.key, event.view])).toEqual([['frankwiles/gg', 'overview']]);
  });

  it('opens a direct view for the selection', () => {
    const memory = cache();
    const session = new SearchSession(memory);

    session.dispatch({ type: 'open', view: 'pulls' });

    expect(session.outcome()).toMatchObject({ status: 'resolved', target: { kind: 'organization', key: 'frankwiles' }, view: 'pulls' });
    expect(memory.events[0]?.view).toBe('pulls');
  });

  it('does nothing on confirm when nothing matches', () => {
    const memory = cache();
    const session = new SearchSession(memory);
    session.dispatch({ type: 'insert', text: 'zzz' });

    session.dispatch({ type: 'confirm' });

    expect(session.state).toEqual({ status: 'filtering', query: 'zzz', selection: 0 });
    expect(session.view().notice).toBe('Nothing selected');
    expect(memory.events).toEqual([]);
  });

  it('still resolves when the usage write fails', () => {
    const memory = cache();
    memory.failWrites = true;
    const session = new SearchSession(memory);

    session.dispatch({ type: 'confirm' });

    expect(session.outcome()?.status).toBe('resolved');
    expect(memory.events).toEqual([]);
  });

  it('ignores input once cancelled', () => {
    const memory = cache();
    const session = new SearchSession(memory);

    session.dispatch({ type: 'cancel' });
    session.dispatch({ type: 'confirm' });

    expect(session.outcome()).toEqual({ status: 'cancelled' });
    expect(memory.events).toEqual([]);
  });

  it('starts empty with a notice when the cache cannot be read', () => {
    const memory = cache();
    memory.failReads = true;

    const session = new SearchSession(memory);

    expect(session.view().totalCandidates).toBe(0);
    expect(session.view().notice).toBe('Cache unavailable: Storage read failed: database disk image is malformed');
  });
});

describe('runSearchSession', () => {
  it('renders once up front and after every input', async () => {
    const views: SessionView[] = [];

    const outcome = await runSearchSession(
      cache(),
      inputs({ type: 'insert', text: 'b' }, { type: 'confirm' }, { type: 'insert', text: 'x' }),
      { onRender: (view) => views.push(view) },
    );

    expect(outcome).toMatchObject({ status: 'resolved', target: { key: 'frankwiles/blog' } });
    expect(views.map((view) => view.query)).toEqual(['', 'b', 'b']);
  });

  it('treats an input stream that ends as a cancel', async () => {
    const outcome = await runSearchSession(cache(), inputs({ type: 'insert', text: 'g' }));

    expect(outcome).toEqual({ status: 'cancelled' });
  });
});
