// src/core/auth/browser.ts

import { spawn } from 'child_process';
import type { UrlOpener } from './types';
import type { Logger } from '../../observability/Logger';

function openCommand(url: string): { command: string; args: string[] } {
  switch (process.platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // "start" treats the first quoted argument as a window title
      return { command: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Open the URL in the system browser (fire and forget)
 */
export function createBrowserOpener(logger: Logger): UrlOpener {
  return (url: string) =>
    new Promise<void>((resolve, reject) => {
      const { command, args } = openCommand(url);
      const child = spawn(command, args, { stdio: 'ignore', detached: true });

      child.once('error', (error) => {
        reject(error);
      });
      child.once('spawn', () => {
        logger.debug('Browser launched', { command });
        child.unref();
        resolve();
      });
    });
}

/**
 * Opener for headless environments: the URL is only logged
 */
export function createLoggingOpener(logger: Logger): UrlOpener {
  return (url: string) => {
    logger.info('Open this URL in a browser to continue', { authUrl: url });
  };
}
