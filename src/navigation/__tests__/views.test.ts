import { describe, it, expect } from 'vitest';
import { urlFor } from '../views.js';

const repo = { kind: 'repository', key: 'acme/api' } as const;
const organization = { kind: 'organization', key: 'acme' } as const;

describe('urlFor', () => {
  it('builds repository view addresses', () => {
    expect(urlFor(repo, 'overview')).toBe('https://github.com/acme/api');
    expect(urlFor(repo, 'issues')).toBe('https://github.com/acme/api/issues');
    expect(urlFor(repo, 'pulls')).toBe('https://github.com/acme/api/pulls');
    expect(urlFor(repo, 'actions')).toBe('https://github.com/acme/api/actions');
    expect(urlFor(repo, 'milestones')).toBe('https://github.com/acme/api/milestones');
    expect(urlFor(repo, 'settings')).toBe('https://github.com/acme/api/settings');
  });

  it('builds organization view addresses', () => {
    expect(urlFor(organization, 'overview')).toBe('https://github.com/acme');
    expect(urlFor(organization, 'milestones')).toBe('https://github.com/acme');
    expect(urlFor(organization, 'issues')).toBe(
      'https://github.com/search?q=org%3Aacme%20is%3Aissue%20is%3Aopen&type=issues',
    );
    expect(urlFor(organization, 'pulls')).toBe(
      'https://github.com/search?q=org%3Aacme%20is%3Apr%20is%3Aopen&type=pullrequests',
    );
    expect(urlFor(organization, 'settings')).toBe('https://github.com/organizations/acme/settings/profile');
  });

  it('uses the configured web address without doubling slashes', () => {
    expect(urlFor(repo, 'issues', 'https://git.example.test/')).toBe('https://git.example.test/acme/api/issues');
  });
});
