export * from './types';
export { startSchedulerLoop, runSchedulerTick, reminderText } from './loop';
