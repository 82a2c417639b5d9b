export { runPlanningPipeline } from './run-week';

export type { PlanningInputs, PlanningOptions, PlanningRun } from './run-week';
