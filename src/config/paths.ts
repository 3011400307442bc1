/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.concierge/
 * ├── concierge.db   (SQLite: sessions, vectors, eval runs)
 * ├── config.toml    (User configuration)
 * └── eval/          (Evaluation reports)
 *
 * CONCIERGE_HOME moves the whole directory; CONCIERGE_DB_PATH moves only the
 * database. Both are read on every call so tests can stub them.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export function getHomeDir(): string {
  const override = process.env.CONCIERGE_HOME?.trim();
  return override ? override : join(homedir(), '.concierge');
}

export function getDbPath(): string {
  const override = process.env.CONCIERGE_DB_PATH?.trim();
  return override ? override : join(getHomeDir(), 'concierge.db');
}

export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}

/**
 * Expand a leading `~` so config values like `~/.concierge/eval` work.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
