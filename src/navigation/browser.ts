/**
 * @fileoverview Launch the platform browser for a URL
 */

import { execa } from 'execa';
import { logDebug } from '../telemetry/logger.js';

export interface OpenerCommand {
  file: string;
  args: string[];
}

/** Opens a web address; the core never looks at a result. */
export type UrlOpener = (url: string) => Promise<void>;

export function openerCommand(url: string, platform: NodeJS.Platform = process.platform): OpenerCommand {
  switch (platform) {
    case 'darwin':
      return { file: 'open', args: [url] };
    case 'win32':
      // The empty string is `start`'s window title, so a quoted URL is not taken for one.
      return { file: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { file: 'xdg-open', args: [url] };
  }
}

export const openInBrowser: UrlOpener = async (url) => {
  const { file, args } = openerCommand(url);
  logDebug('Opening browser', { file, url });
  const result = await execa(file, args, { reject: false, stdio: 'ignore' });
  if (result.failed) {
    const reason = result.exitCode === undefined ? (result.shortMessage ?? 'failed to start') : `${file} exited with ${result.exitCode}`;
    throw new Error(`Could not open ${url}: ${reason}`);
  }
};
