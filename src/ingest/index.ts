export { backfillDirectUrls } from "./backfill";
export type { BackfillDependencies, BackfillStats } from "./backfill";
export { artifactPath, IngestionCoordinator } from "./ingestionCoordinator";
export type { IngestionDependencies, RetryPendingOptions } from "./ingestionCoordinator";
