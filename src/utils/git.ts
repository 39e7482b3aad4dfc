/**
 * @fileoverview Git Utilities
 * Read-only queries against the working tree the CLI runs in.
 */

import { execa } from 'execa';

async function git(dir: string, args: string[]): Promise<string | null> {
  const result = await execa('git', args, { cwd: dir, reject: false, stdin: 'ignore' });
  if (result.failed || result.exitCode !== 0) return null;
  const output = result.stdout.trim();
  return output.length > 0 ? output : null;
}

export async function isGitRepo(dir: string): Promise<boolean> {
  return (await git(dir, ['rev-parse', '--is-inside-work-tree'])) === 'true';
}

export async function getRemoteUrl(dir: string, remote = 'origin'): Promise<string | null> {
  return git(dir, ['remote', 'get-url', remote]);
}

/** Current branch name, or null on a detached HEAD. */
export async function getCurrentBranch(dir: string): Promise<string | null> {
  return git(dir, ['branch', '--show-current']);
}
