/**
 * DASHBOARD MODULE — Index
 */

export { registerDashboardRoutes } from './dashboard.routes.js';
export type { DashboardRouteDeps } from './dashboard.routes.js';
