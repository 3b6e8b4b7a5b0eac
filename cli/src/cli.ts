#!/usr/bin/env node
/**
 * hostwarden CLI
 *
 * Keeps an eye on a list of SSH hosts and opens sessions to them.
 * Built with Ink (React for CLIs).
 *
 * Commands:
 *   hostwarden            - Start the dashboard (health monitor runs in the background)
 *   hostwarden status     - Probe every target once
 *   hostwarden list       - List configured targets
 *   hostwarden connect    - Open an SSH session without the dashboard
 */

import { Command } from "commander";
import {
  startDashboard,
  listTargets,
  showStatus,
  probeOne,
  connectTarget,
  addTarget,
  removeTarget,
  showTerminals,
} from "./commands/index.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("hostwarden")
  .description("Terminal dashboard for monitoring and connecting to SSH hosts")
  .version(VERSION);

program
  .command("dashboard", { isDefault: true })
  .description("Start the interactive dashboard")
  .option("--connection-mode <mode>", "How connections open: auto, new-window or direct")
  .option("--new-window", "Always open connections in a new terminal window")
  .option("--direct", "Always run ssh in this terminal")
  .option("--interval <seconds>", "Seconds between background health checks")
  .option("--verbose", "Log engine activity")
  .action(startDashboard);

program
  .command("list")
  .description("List configured targets")
  .option("--json", "Output as JSON")
  .option("-f, --filter <query>", "Match name, host, user or tag")
  .action(listTargets);

program
  .command("status")
  .description("Probe every target once and show its health")
  .action(showStatus);

program
  .command("probe <target>")
  .description("Run a full probe against one target")
  .action(probeOne);

program
  .command("connect <target>")
  .description("Verify a target and open an SSH session to it")
  .option("-m, --mode <mode>", "auto, new-window or direct")
  .option("--verbose", "Log engine activity")
  .action(connectTarget);

program
  .command("add <name> <host>")
  .description("Add a target to the config file")
  .option("-p, --port <port>", "SSH port (default: 22)")
  .option("-u, --user <user>", "Login user (default: current user)")
  .option("-k, --key <path>", "Authenticate with a private key file")
  .option("--agent", "Authenticate through ssh-agent (default)")
  .option("--password", "Authenticate with a password prompt")
  .option("--interactive", "Keyboard-interactive authentication")
  .option("-t, --tag <tags...>", "Tags for filtering")
  .option("-d, --description <text>", "Free-form description")
  .action(addTarget);

program
  .command("remove <target>")
  .description("Remove a target from the config file")
  .action(removeTarget);

program
  .command("terminals")
  .description("Show which terminal emulators can open new windows")
  .action(showTerminals);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
