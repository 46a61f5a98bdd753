/**
 * System clipboard access through the platform's copy command.
 */

import { execFile } from 'node:child_process';

export interface ClipboardCommand {
  command: string;
  args: string[];
}

/** Copy commands to try, in order, for a platform */
export function clipboardCommands(platform: NodeJS.Platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    case 'win32':
      return [{ command: 'clip', args: [] }];
    default:
      return [
        { command: 'wl-copy', args: [] },
        { command: 'xclip', args: ['-selection', 'clipboard'] },
      ];
  }
}

function pipeTo({ command, args }: ClipboardCommand, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = execFile(command, args, (error) => {
      if (error) reject(error);
      else resolve();
    });
    child.stdin?.end(text);
  });
}

/**
 * Copy `text` with the first command that succeeds.
 * Returns the command used; throws when none works.
 */
export async function copyToClipboard(
  text: string,
  platform: NodeJS.Platform = process.platform
): Promise<string> {
  const failures: string[] = [];
  for (const candidate of clipboardCommands(platform)) {
    try {
      await pipeTo(candidate, text);
      return candidate.command;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push(`${candidate.command}: ${message}`);
    }
  }
  throw new Error(`No clipboard command worked (${failures.join('; ')})`);
}
