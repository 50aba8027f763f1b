// Sync Services - Re-exports
export { JobRunner, type JobRunnerDeps } from "./job-runner.js";
export {
  SyncScheduler,
  type SchedulerState,
  type SchedulerStatus,
  type SyncSchedulerOptions,
} from "./scheduler.js";
