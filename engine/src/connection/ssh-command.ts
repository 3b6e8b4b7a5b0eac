/**
 * SSH Command Builder
 *
 * Builds the argv handed to the `ssh` binary, either directly or wrapped
 * in a terminal emulator's command line.
 */

import { homedir } from 'os';
import { join } from 'path';
import type { AuthMethod, Target } from '@hostwarden/core';
import { SSH_CLIENT_OPTIONS } from './constants.js';

export const SSH_BINARY = 'ssh';

type SshEndpoint = Pick<Target, 'host' | 'port' | 'user' | 'auth'>;

/**
 * Expand a leading `~` to the current user's home directory.
 * `~otheruser/...` is left untouched.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function authArgs(auth: AuthMethod): string[] {
  switch (auth.type) {
    case 'key':
      return ['-i', expandHome(auth.keyPath)];
    case 'password':
      return ['-o', 'PreferredAuthentications=password'];
    case 'interactive':
      return ['-o', 'PreferredAuthentications=keyboard-interactive'];
    case 'agent':
      return [];
  }
}

/**
 * Arguments for `ssh` (without the binary itself). The destination
 * comes last, after `--`, so a user or host can never be read as an option.
 */
export function buildSshArgs(target: SshEndpoint): string[] {
  return [
    '-p', String(target.port),
    ...authArgs(target.auth),
    ...SSH_CLIENT_OPTIONS,
    '--',
    `${target.user}@${target.host}`,
  ];
}

/** Full command line including the binary. */
export function buildSshArgv(target: SshEndpoint): string[] {
  return [SSH_BINARY, ...buildSshArgs(target)];
}

/**
 * Join argv into a single POSIX shell command, quoting where needed.
 */
export function toShellCommand(argv: readonly string[]): string {
  return argv
    .map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/** Human-readable auth description for banners and listings. */
export function describeAuth(auth: AuthMethod): string {
  switch (auth.type) {
    case 'key':
      return `public key (${auth.keyPath})`;
    case 'agent':
      return 'SSH agent';
    case 'password':
      return 'password';
    case 'interactive':
      return 'keyboard-interactive';
  }
}
