import type { CommandSpec } from '../runner/types';

/** The command that opens `url` in the user's default browser. */
export function openUrlCommand(url: string, platform: NodeJS.Platform, opener?: string): CommandSpec {
  if (opener) {
    return { command: opener, args: [url] };
  }

  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // `start` treats its first quoted argument as a window title
      return { command: 'cmd', args: ['/c', 'start', '', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}
