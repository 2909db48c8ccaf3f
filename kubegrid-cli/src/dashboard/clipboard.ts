/**
 * Copies text to the system clipboard through whichever tool the platform has.
 *
 * macOS uses pbcopy; elsewhere wl-copy (under Wayland), xclip, then xsel.
 * Failures come back as a result for a toast rather than as exceptions.
 */

import { execFileSync } from 'child_process';
import { errorMessage, getLogger } from 'kubegrid-shared';

const log = getLogger('clipboard');

export interface ClipboardResult {
  success: boolean;
  /** Human-readable message suitable for display in a toast. */
  message: string;
}

export type CopyToClipboard = (text: string) => ClipboardResult;

export function copyToClipboard(text: string): ClipboardResult {
  if (process.platform === 'darwin') {
    return tryCommand('pbcopy', [], text);
  }

  for (const [cmd, args] of linuxCommands()) {
    const result = tryCommand(cmd, args, text);
    if (result.success) return result;
  }

  return {
    success: false,
    message: 'Clipboard unavailable: install wl-copy, xclip or xsel',
  };
}

function linuxCommands(): [string, string[]][] {
  const commands: [string, string[]][] = [];
  if (process.env.WAYLAND_DISPLAY) {
    commands.push(['wl-copy', []]);
  }
  commands.push(['xclip', ['-selection', 'clipboard']]);
  commands.push(['xsel', ['--clipboard', '--input']]);
  return commands;
}

function tryCommand(cmd: string, args: string[], input: string): ClipboardResult {
  try {
    execFileSync(cmd, args, { input, stdio: ['pipe', 'pipe', 'pipe'] });
    return { success: true, message: 'Copied to clipboard' };
  } catch (err) {
    log.debug({ cmd, err: errorMessage(err) }, 'clipboard command failed');
    return { success: false, message: `${cmd} failed` };
  }
}
