export { parseCaseParties } from "./caseParties";
export { ALL_SOURCE_IDS, courtName, courtNumber } from "./courts";
export { extractCaseNumber, parseCriminalCauses } from "./docketParser";
export { assignOpinionTypes, classifyOpinion } from "./opinionType";
export type { OpinionClassification, OpinionKind } from "./opinionType";
export { buildCaseUrl, buildDocketUrl, TexasCoaSourceAdapter } from "./texasCoaAdapter";
export type { TexasCoaAdapterDependencies } from "./texasCoaAdapter";
export type { CasePageTarget, CasePartiesSource, DocketCase, DocketDocument, SourceAdapter } from "./types";
