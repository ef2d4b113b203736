export type { JobName, JobRunner, JobServices } from './job-runner.js';
export { createJobRunner } from './job-runner.js';
