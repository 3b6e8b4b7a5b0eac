/**
 * Terminal Detector
 *
 * Picks the terminal emulator used for new-window launches:
 * 1. The terminal we're running inside, when its environment markers say so
 * 2. Otherwise the first catalog entry present on this platform
 *
 * Terminals that cannot open new windows are never returned.
 */

import type { Logger } from '@hostwarden/core';
import { createLogger } from '@hostwarden/core';
import { isCommandOnPath, isProcessNamed } from '../connection/process-detection.js';
import { TERMINAL_CATALOG } from './terminal-catalog.js';
import type { DetectionStrategy, EnvMarker, TerminalDescriptor } from './terminal-catalog.js';

export interface TerminalDetectorOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  catalog?: readonly TerminalDescriptor[];
  isCommandOnPath?: (cmd: string) => Promise<boolean>;
  isProcessNamed?: (pattern: string) => Promise<boolean>;
  logger?: Logger;
}

export interface TerminalAvailability {
  terminal: TerminalDescriptor;
  present: boolean;
  usable: boolean;
}

export class TerminalDetector {
  private platform: NodeJS.Platform;
  private env: NodeJS.ProcessEnv;
  private catalog: readonly TerminalDescriptor[];
  private commandLookup: (cmd: string) => Promise<boolean>;
  private processLookup: (pattern: string) => Promise<boolean>;
  private logger: Logger;

  constructor(options: TerminalDetectorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
    this.catalog = options.catalog ?? TERMINAL_CATALOG;
    this.commandLookup = options.isCommandOnPath ?? isCommandOnPath;
    this.processLookup = options.isProcessNamed ?? isProcessNamed;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  /** Catalog entries that apply to the current platform, in priority order. */
  forPlatform(): TerminalDescriptor[] {
    return this.catalog.filter((t) => t.platforms.includes(this.platform));
  }

  /** Names of the terminals a new window can be opened in on this platform. */
  supportedTerminalNames(): string[] {
    return this.forPlatform().filter((t) => t.spawnsWindows).map((t) => t.name);
  }

  /**
   * The terminal the current process runs in, identified by environment
   * markers alone (nothing is spawned).
   */
  identifyCurrent(): TerminalDescriptor | null {
    return this.forPlatform().find((t) => t.envMarkers.some((m) => this.matchesEnv(m))) ?? null;
  }

  /**
   * Find a terminal that can open a new window, or null when none is usable.
   */
  async detect(): Promise<TerminalDescriptor | null> {
    const current = this.identifyCurrent();
    if (current) {
      if (!current.spawnsWindows) {
        this.warn(`[Terminal] Running inside ${current.name}, which does not support opening new windows`);
        return null;
      }
      this.log(`[Terminal] Using current terminal: ${current.name}`);
      return current;
    }

    for (const terminal of this.forPlatform()) {
      if (!(await this.isPresent(terminal.detection))) continue;
      if (!terminal.spawnsWindows) {
        this.warn(`[Terminal] ${terminal.name} detected but cannot open new windows, skipping`);
        continue;
      }
      this.log(`[Terminal] Detected ${terminal.name}`);
      return terminal;
    }

    this.log('[Terminal] No terminal emulator available');
    return null;
  }

  /** Presence and usability of every terminal for this platform. */
  async listAvailability(): Promise<TerminalAvailability[]> {
    const results: TerminalAvailability[] = [];
    for (const terminal of this.forPlatform()) {
      const present = await this.isPresent(terminal.detection);
      results.push({ terminal, present, usable: present && terminal.spawnsWindows });
    }
    return results;
  }

  private matchesEnv(marker: EnvMarker): boolean {
    const value = this.env[marker.name];
    if (!value) return false;
    return marker.value === undefined || value === marker.value;
  }

  private async isPresent(detection: DetectionStrategy): Promise<boolean> {
    switch (detection.kind) {
      case 'executable':
        return this.commandLookup(detection.command);
      case 'process':
        return this.processLookup(detection.pattern);
      case 'platform':
        return true;
    }
  }
}
