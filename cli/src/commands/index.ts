/**
 * CLI Commands
 */

export { startDashboard } from "./dashboard.js";
export type { DashboardOptions } from "./dashboard.js";
export { listTargets } from "./list.js";
export type { ListOptions } from "./list.js";
export { showStatus } from "./status.js";
export { probeOne } from "./probe.js";
export { connectTarget } from "./connect.js";
export type { ConnectOptions } from "./connect.js";
export { addTarget } from "./add.js";
export type { AddTargetOptions } from "./add.js";
export { removeTarget } from "./remove.js";
export { showTerminals } from "./terminals.js";
