/**
 * Scheduler feature barrel export.
 */

export { DeliveryMailbox } from "./DeliveryMailbox";
export type { DeliveryHandler, DrainScheduler } from "./DeliveryMailbox";
export { UpdateScheduler } from "./UpdateScheduler";
export type { PollTaskState, SchedulerStats, UpdateSchedulerOptions } from "./UpdateScheduler";
