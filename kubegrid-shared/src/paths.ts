/**
 * Config and state path resolution.
 */

import * as path from 'path';
import * as os from 'os';

const APP_DIR = 'kubegrid';

/**
 * Gets the kubegrid config directory.
 * $XDG_CONFIG_HOME/kubegrid or ~/.config/kubegrid on Unix, %APPDATA%/kubegrid on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), APP_DIR);
  }
  const xdg = process.env.XDG_CONFIG_HOME;
  if (xdg) return path.join(xdg, APP_DIR);
  return path.join(os.homedir(), '.config', APP_DIR);
}

/** ~/.config/kubegrid/config.json */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/** ~/.config/kubegrid/kubegrid.log */
export function getLogPath(): string {
  return path.join(getConfigDir(), 'kubegrid.log');
}

/**
 * Default file name for saved pod logs, in the current directory.
 * e.g. web-7d9c-2024-05-01T10-22-03.log
 */
export function getLogExportPath(pod: string, now: Date = new Date()): string {
  return path.resolve(`${pod}-${fileStamp(now)}.log`);
}

/** Default file name for an exported query result, in the current directory. */
export function getQueryExportPath(pod: string, now: Date = new Date()): string {
  return path.resolve(`${pod}-query-${fileStamp(now)}.csv`);
}

/** ~/.config/kubegrid/saved_queries.json */
export function getSavedQueriesPath(configDir: string = getConfigDir()): string {
  return path.join(configDir, 'saved_queries.json');
}

/** ~/.config/kubegrid/query_history/<namespace>__<pod>__<database>.json */
export function getQueryHistoryPath(
  namespace: string,
  pod: string,
  database: string,
  configDir: string = getConfigDir(),
): string {
  const name = [namespace, pod, database].map(safeName).join('__');
  return path.join(configDir, 'query_history', `${name}.json`);
}

function safeName(part: string): string {
  return part.replace(/[^\p{L}\p{N}._-]/gu, '_');
}

function fileStamp(now: Date): string {
  return now.toISOString().replace(/\.\d+Z$/, '').replace(/:/g, '-');
}
