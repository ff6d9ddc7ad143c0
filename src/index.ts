export {
  ALGORITHMS,
  getAlgorithm,
  isAlgorithmName,
  simulate,
  simulateAll,
  scheduleFcfs,
  scheduleSjf,
  schedulePrioritySjf,
  scheduleRoundRobin,
  runPreemptive,
  byRemainingBurst,
  byPriorityThenRemaining,
  ReadyQueue,
  TimelineRecorder,
  MetricsAccumulator,
  FCFS_TITLE,
  SJF_TITLE,
  PRIORITY_TITLE,
  RR_TITLE,
} from './scheduling/index.js';
export type { ReadyCandidate, CandidateComparator } from './scheduling/index.js';
export {
  SchedulerError,
  toSchedulerError,
  zodErrorToSchedulerError,
  type SchedulerErrorCode,
  type SchedulerErrorShape,
} from './api/errors.js';
export * from './api/validators.js';
export { parseProcesses, loadProcessFile, splitRecords } from './io/process-loader.js';
export * from './report/renderer.js';
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getSimulationOptions,
  getRenderOptions,
  defaultConfigPath,
} from './config/loader.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
