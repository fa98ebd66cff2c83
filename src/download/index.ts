export { DownloadManager } from "./downloadManager";
export type { DownloadManagerDependencies, FetchedArtifact } from "./downloadManager";
export { assertSignature, hasPdfSignature } from "./signatures";
export type { ArtifactKind } from "./signatures";
