import { describe, it, expect } from 'vitest';
import { SyncError } from '../../core/errors.js';
import { validateSnapshot } from '../snapshot.js';
import { FETCHED_AT, org, remoteRepo, snapshot } from '../../__tests__/helpers/fixtures.js';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof SyncError) return error.issues;
    throw error;
  }
  throw new Error('expected a SyncError');
}

describe('validateSnapshot', () => {
  it('passes a consistent snapshot through', () => {
    const result = validateSnapshot(snapshot([org(1, 'acme')], [remoteRepo(7, 'acme/api')]));

    expect(result.organizations).toEqual([org(1, 'acme')]);
    expect(result.repositories.map((r) => r.fullName)).toEqual(['acme/api']);
    expect(result.fetchedAt).toEqual(FETCHED_AT);
  });

  it('keeps the last copy of an entry repeated under the same id', () => {
    const result = validateSnapshot(
      snapshot([], [remoteRepo(7, 'acme/api', { private: false }), remoteRepo(7, 'acme/api', { private: true })]),
    );

    expect(result.repositories).toHaveLength(1);
    expect(result.repositories[0]?.private).toBe(true);
  });

  it('reports one id appearing under two logins', () => {
    expect(issuesOf(() => validateSnapshot(snapshot([org(1, 'acme'), org(1, 'acme-old')], []))))
      .toEqual(['organization id 1 appears as both acme and acme-old']);
  });

  it('reports a full name that disagrees with owner and name', () => {
    const repo = remoteRepo(7, 'acme/api', { fullName: 'acme/web' });

    expect(issuesOf(() => validateSnapshot(snapshot([], [repo])))).toEqual([
      'repository 7: full name acme/web does not match acme/api',
    ]);
  });

  it('rejects structurally invalid entries with their paths', () => {
    const broken = snapshot([org(1, '')], []);

    expect(issuesOf(() => validateSnapshot(broken))).toEqual([
      'organizations.0.login: String must contain at least 1 character(s)',
    ]);
  });

  it('rejects incomplete snapshots', () => {
    expect(() => validateSnapshot({ ...snapshot([], []), complete: false })).toThrow(
      'Refresh aborted: snapshot is incomplete',
    );
  });
});
