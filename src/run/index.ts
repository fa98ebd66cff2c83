export { computeOutcome, RunCoordinator } from "./runCoordinator";
export type { FinalOutcome, OutcomeInput, RunCoordinatorDependencies, RunParams } from "./runCoordinator";
