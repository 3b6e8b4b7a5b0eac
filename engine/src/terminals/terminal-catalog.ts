/**
 * Terminal Catalog
 *
 * One descriptor per supported terminal emulator, in detection priority
 * order. Each descriptor says how to find the terminal, which environment
 * variables identify it from inside, and how to wrap an ssh command line
 * for it.
 */

import { toShellCommand } from '../connection/ssh-command.js';

export type TerminalId =
  | 'windows_terminal'
  | 'ghostty'
  | 'alacritty'
  | 'kitty'
  | 'wezterm'
  | 'gnome_terminal'
  | 'konsole'
  | 'xfce_terminal'
  | 'xterm'
  | 'terminal_app'
  | 'warp';

/** How to tell whether a terminal is present on this machine. */
export type DetectionStrategy =
  | { kind: 'executable'; command: string }
  | { kind: 'process'; pattern: string }
  | { kind: 'platform' };

/** An environment variable the terminal sets in its own shells. */
export interface EnvMarker {
  name: string;
  /** Exact value to match; any non-empty value when omitted */
  value?: string;
}

export interface TerminalCommand {
  command: string;
  args: string[];
}

export interface TerminalDescriptor {
  id: TerminalId;
  name: string;
  platforms: readonly NodeJS.Platform[];
  detection: DetectionStrategy;
  envMarkers: readonly EnvMarker[];
  /** False for terminals that cannot be asked to open a new window */
  spawnsWindows: boolean;
  buildCommand: (sshArgv: readonly string[]) => TerminalCommand | null;
}

const UNIX: readonly NodeJS.Platform[] = ['linux', 'darwin', 'freebsd', 'openbsd'];
const X11: readonly NodeJS.Platform[] = ['linux', 'freebsd', 'openbsd'];

/** Escape a string for an AppleScript double-quoted literal. */
export function escapeForAppleScript(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export const TERMINAL_CATALOG: readonly TerminalDescriptor[] = [
  {
    id: 'windows_terminal',
    name: 'Windows Terminal',
    platforms: ['win32'],
    detection: { kind: 'executable', command: 'wt' },
    envMarkers: [{ name: 'WT_SESSION' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'wt', args: ['new-tab', ...argv] }),
  },
  {
    id: 'ghostty',
    name: 'Ghostty',
    platforms: UNIX,
    detection: { kind: 'executable', command: 'ghostty' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'ghostty' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'ghostty', args: ['-e', ...argv] }),
  },
  {
    id: 'alacritty',
    name: 'Alacritty',
    platforms: UNIX,
    detection: { kind: 'executable', command: 'alacritty' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'Alacritty' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'alacritty', args: ['-e', ...argv] }),
  },
  {
    id: 'kitty',
    name: 'Kitty',
    platforms: UNIX,
    detection: { kind: 'executable', command: 'kitty' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'kitty' }, { name: 'KITTY_WINDOW_ID' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'kitty', args: [...argv] }),
  },
  {
    id: 'wezterm',
    name: 'WezTerm',
    platforms: [...UNIX, 'win32'],
    detection: { kind: 'executable', command: 'wezterm' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'WezTerm' }, { name: 'WEZTERM_PANE' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'wezterm', args: ['start', '--', ...argv] }),
  },
  {
    id: 'gnome_terminal',
    name: 'GNOME Terminal',
    platforms: X11,
    detection: { kind: 'executable', command: 'gnome-terminal' },
    envMarkers: [],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'gnome-terminal', args: ['--', ...argv] }),
  },
  {
    id: 'konsole',
    name: 'Konsole',
    platforms: X11,
    detection: { kind: 'executable', command: 'konsole' },
    envMarkers: [],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'konsole', args: ['-e', ...argv] }),
  },
  {
    id: 'xfce_terminal',
    name: 'XFCE Terminal',
    platforms: X11,
    detection: { kind: 'executable', command: 'xfce4-terminal' },
    envMarkers: [],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'xfce4-terminal', args: ['-x', ...argv] }),
  },
  {
    id: 'xterm',
    name: 'XTerm',
    platforms: X11,
    detection: { kind: 'executable', command: 'xterm' },
    envMarkers: [],
    spawnsWindows: true,
    buildCommand: (argv) => ({ command: 'xterm', args: ['-e', ...argv] }),
  },
  {
    id: 'terminal_app',
    name: 'Terminal.app',
    platforms: ['darwin'],
    detection: { kind: 'platform' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'Apple_Terminal' }],
    spawnsWindows: true,
    buildCommand: (argv) => ({
      command: 'osascript',
      args: [
        '-e', `tell application "Terminal" to do script "${escapeForAppleScript(toShellCommand(argv))}"`,
        '-e', 'tell application "Terminal" to activate',
      ],
    }),
  },
  {
    id: 'warp',
    name: 'Warp',
    platforms: ['linux', 'darwin'],
    detection: { kind: 'process', pattern: 'warp-terminal' },
    envMarkers: [{ name: 'TERM_PROGRAM', value: 'WarpTerminal' }],
    spawnsWindows: false,
    buildCommand: () => null,
  },
];

export function findTerminal(id: TerminalId): TerminalDescriptor | undefined {
  return TERMINAL_CATALOG.find((t) => t.id === id);
}
