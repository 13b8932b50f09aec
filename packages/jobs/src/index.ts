export { RedisBroker, type Broker, type ListConnection } from "./broker.js";
export { MemoryBroker } from "./memoryBroker.js";
export { SqliteJobStore, canTransition, type JobStatusStore } from "./jobStore.js";
export {
  runIngestionJob,
  completionMessage,
  type JobRunnerDeps,
  type PipelineRunner,
} from "./jobRunner.js";
export { IngestionWorker, type WorkerOptions } from "./worker.js";
export { WorkerSupervisor, type WorkerState, type Runnable, type SupervisorOptions } from "./supervisor.js";
export { sleep } from "./sleep.js";
