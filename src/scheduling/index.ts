// Scheduling module — periodic checkpoint maintenance
export { createMaintenanceScheduler } from './maintenance-scheduler.js';
export type {
  MaintenanceReport,
  MaintenanceScheduler,
  MaintenanceSchedulerOptions,
} from './maintenance-scheduler.js';
