export type {
  SweepContext,
  SweepLogger,
  RunSweepSpec,
  SweepSummary,
} from './sweep/types.js';

export { runSweep } from './sweep/run-sweep.js';
export { planSweep } from './sweep/plan-sweep.js';
export type {
  PlanSweepSpec,
  PlanSweepContext,
  PlannedPoint,
  SweepPlan,
} from './sweep/plan-sweep.js';
export { inventorySweep } from './sweep/inventory-sweep.js';
export type {
  ArtifactStatus,
  InventoryEntry,
  InventorySweepSpec,
  SweepInventory,
} from './sweep/inventory-sweep.js';

export { createProductionSweepContext } from './context/createProductionSweepContext.js';
export type { ProductionSweepContextConfig } from './context/createProductionSweepContext.js';

export {
  runProcess,
  formatCommandLine,
  tailLines,
} from './adapters/process-runner.js';
export type { ProcessSpec, ProcessRun, ProcessRunner } from './adapters/process-runner.js';
export { MakeBuildStep } from './adapters/make-build-step.js';
export type { MakeBuildStepDeps } from './adapters/make-build-step.js';
export { PerfMeasurementStep } from './adapters/perf-measurement-step.js';
export type { OutputWriter, PerfMeasurementStepDeps } from './adapters/perf-measurement-step.js';
export { FileResultSink, ArtifactExistsError } from './adapters/file-result-sink.js';
export type { FileResultSinkOptions, ExistingArtifactPolicy } from './adapters/file-result-sink.js';
