/**
 * Holdback Runtime Host — HOLDBACK_HOME Resolution
 *
 * Resolves the Holdback home directory using the following precedence:
 *
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. HOLDBACK_HOME environment variable
 *   3. OS application config file (last home chosen with --persist-home)
 *   4. Default: ~/.holdback
 *
 * All queue data lives under the resolved home:
 *
 *   <HOLDBACK_HOME>/
 *     queues/
 *       index.json
 *       <queueId>/
 *         metadata.json
 *         state/queue.json
 *         logs/events.jsonl
 *         logs/outbox.jsonl
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the Holdback application config file.
 *
 *   macOS:   ~/Library/Preferences/holdback/config.json
 *   Windows: %APPDATA%\holdback\config.json
 *   Linux:   $XDG_CONFIG_HOME/holdback/config.json (default ~/.config)
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'holdback', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'holdback', 'config.json');
    }
    default: {
      const xdg = process.env['XDG_CONFIG_HOME'];
      const base = xdg !== undefined && xdg !== '' ? xdg : join(home, '.config');
      return join(base, 'holdback', 'config.json');
    }
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * The persisted home path, or null if the config file is missing, unreadable,
 * or has no non-empty `home` string.
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('home' in parsed)) return null;
  const home = parsed.home;
  return typeof home === 'string' && home !== '' ? home : null;
}

export function writeHomeToConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Remember an explicit `home` in the OS config file. Default false. */
  readonly persist?: boolean | undefined;
  /** Environment to read HOLDBACK_HOME from. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Config file location. Defaults to getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the Holdback home directory and make sure it exists.
 */
export function resolveHoldbackHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? getOsConfigPath();
  const fromEnv = env['HOLDBACK_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromConfig(configPath) ?? join(homedir(), '.holdback');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (opts.persist === true && opts.home !== undefined && opts.home !== '') {
    writeHomeToConfig(home, configPath);
  }

  return home;
}
