/**
 * Services module exports
 */
export { UpdateScheduler, type UpdateSchedulerOptions } from './UpdateScheduler.js';
