/**
 * @fileoverview Snapshot validation
 *
 * A refresh is all-or-nothing, so everything that could make the snapshot
 * unusable is checked here before the store opens a transaction.
 */

import { z } from 'zod';
import { SyncError } from '../core/errors.js';
import type { Organization, RemoteRepository, RemoteSnapshot } from '../types.js';

const OrganizationSchema = z.object({
  id: z.number().int().nonnegative(),
  login: z.string().min(1),
});

const RemoteRepositorySchema = z.object({
  id: z.number().int().nonnegative(),
  ownerId: z.number().int().nonnegative(),
  ownerLogin: z.string().min(1),
  name: z.string().min(1),
  fullName: z.string().min(3),
  private: z.boolean(),
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  defaultBranch: z.string().nullable().optional(),
});

const RemoteSnapshotSchema = z.object({
  organizations: z.array(OrganizationSchema),
  repositories: z.array(RemoteRepositorySchema),
  fetchedAt: z.date().refine((date) => !Number.isNaN(date.getTime()), 'invalid date'),
  complete: z.boolean(),
});

export interface ValidatedSnapshot {
  organizations: Organization[];
  repositories: RemoteRepository[];
  fetchedAt: Date;
}

/**
 * Validate a snapshot and coalesce repeated entries.
 *
 * Entries repeated with the same id collapse to the last occurrence. The same
 * login or full name claimed by two different ids, or one id under two
 * names, is a conflict and aborts the refresh.
 */
export function validateSnapshot(snapshot: RemoteSnapshot): ValidatedSnapshot {
  const parsed = RemoteSnapshotSchema.safeParse(snapshot);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SyncError('snapshot is malformed', issues);
  }
  const data = parsed.data;
  if (!data.complete) {
    throw new SyncError('snapshot is incomplete');
  }

  const issues: string[] = [];
  const organizations = coalesce(data.organizations, (org) => org.login, 'organization', issues);

  for (const repo of data.repositories) {
    const expected = `${repo.ownerLogin}/${repo.name}`;
    if (repo.fullName !== expected) {
      issues.push(`repository ${repo.id}: full name ${repo.fullName} does not match ${expected}`);
    }
  }
  const repositories = coalesce(data.repositories, (repo) => repo.fullName, 'repository', issues);

  if (issues.length > 0) {
    throw new SyncError(`snapshot has ${issues.length} conflicting entr${issues.length === 1 ? 'y' : 'ies'}`, issues);
  }

  return { organizations, repositories, fetchedAt: data.fetchedAt };
}

function coalesce<T extends { id: number }>(
  items: T[],
  keyOf: (item: T) => string,
  label: string,
  issues: string[],
): T[] {
  const byKey = new Map<string, T>();
  const keyById = new Map<number, string>();

  for (const item of items) {
    const key = keyOf(item);
    const existing = byKey.get(key);
    if (existing && existing.id !== item.id) {
      issues.push(`${label} ${key} is claimed by ids ${existing.id} and ${item.id}`);
      continue;
    }
    const knownKey = keyById.get(item.id);
    if (knownKey !== undefined && knownKey !== key) {
      issues.push(`${label} id ${item.id} appears as both ${knownKey} and ${key}`);
      continue;
    }
    byKey.set(key, item);
    keyById.set(item.id, key);
  }

  return Array.from(byKey.values());
}
