// ──────────────────────────────────────────
// Maintenance domain — barrel export
// ──────────────────────────────────────────

export { CleanupService } from './cleanup.service';
export { createMaintenanceRoutes } from './routes';
