/**
 * System browser launcher
 * Hands the authorization URL to the platform's default URL handler
 */

import * as child_process from 'node:child_process';
import type { BrowserLauncher } from '../auth/types.ts';

export interface LaunchCommand {
  command: string;
  args: string[];
}

/**
 * Determine the platform-specific command that opens a URL in the default browser
 */
export function getLaunchCommand(url: string, platform: NodeJS.Platform = process.platform): LaunchCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [url] };
  }
  if (platform === 'win32') {
    // The empty string is the window title `start` expects before the target
    return { command: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
  }
  // Linux and others
  return { command: 'xdg-open', args: [url] };
}

/**
 * SystemBrowserLauncher opens URLs with the operating system's default browser
 *
 * Resolves once the launcher process has been spawned; rejects if the command cannot be started.
 */
export class SystemBrowserLauncher implements BrowserLauncher {
  private readonly platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  open(url: string): Promise<void> {
    const { command, args } = getLaunchCommand(url, this.platform);

    return new Promise((resolve, reject) => {
      const child = child_process.spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      });

      child.once('error', reject);
      child.once('spawn', () => {
        child.off('error', reject);
        child.unref();
        resolve();
      });
    });
  }
}
