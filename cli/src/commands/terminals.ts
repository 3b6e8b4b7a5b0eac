/**
 * Terminals command — which terminal emulators can open new windows here.
 */

import { TerminalDetector } from "@hostwarden/engine";

export async function showTerminals(): Promise<void> {
  const detector = new TerminalDetector();
  const availability = await detector.listAvailability();

  console.log(`\nTerminals for ${process.platform}:\n`);
  for (const { terminal, present, usable } of availability) {
    const marker = usable ? "✓" : present ? "!" : "✗";
    const note = present && !usable ? " (cannot open new windows)" : present ? "" : " (not found)";
    console.log(`  ${marker} ${terminal.name}${note}`);
  }

  const current = detector.identifyCurrent();
  if (current) {
    console.log(`\nRunning inside: ${current.name}`);
  }

  const chosen = await detector.detect();
  console.log(
    chosen
      ? `New windows open in: ${chosen.name}`
      : "No terminal can open new windows; connections take over the current terminal",
  );
}
