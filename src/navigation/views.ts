/**
 * @fileoverview View kinds and their web addresses
 */

import type { UsageTarget, ViewKind } from '../types.js';

export const DEFAULT_WEB_URL = 'https://github.com';

export type WebTarget = Pick<UsageTarget, 'kind' | 'key'>;

function repositoryPath(view: ViewKind): string {
  switch (view) {
    case 'overview':
      return '';
    case 'issues':
      return '/issues';
    case 'pulls':
      return '/pulls';
    case 'actions':
      return '/actions';
    case 'milestones':
      return '/milestones';
    case 'settings':
      return '/settings';
  }
}

function organizationPath(login: string, view: ViewKind): string {
  const search = (filter: string, type: string): string =>
    `/search?q=${encodeURIComponent(`org:${login} ${filter}`)}&type=${type}`;
  switch (view) {
    case 'overview':
    case 'milestones':
      return `/${login}`;
    case 'issues':
      return search('is:issue is:open', 'issues');
    case 'pulls':
      return search('is:pr is:open', 'pullrequests');
    case 'actions':
      return `/organizations/${login}/settings/actions`;
    case 'settings':
      return `/organizations/${login}/settings/profile`;
  }
}

/**
 * Web address of `view` for a repository (`owner/name`) or organization (login).
 * Organizations have no milestones page; that view lands on the profile.
 */
export function urlFor(target: WebTarget, view: ViewKind, webUrl = DEFAULT_WEB_URL): string {
  const base = webUrl.replace(/\/+$/, '');
  if (target.kind === 'organization') {
    return `${base}${organizationPath(target.key, view)}`;
  }
  return `${base}/${target.key}${repositoryPath(view)}`;
}
