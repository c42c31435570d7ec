/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAdminRoutes } from "./admin.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createProofRoutes } from "./proofs.js";
