import type { CaseParty, Opinion, OpinionRef } from "../types";

/**
 * Lists the opinions one source published on one date. Implementations fetch and parse
 * the source's listing page and fail with `SourceUnavailableError` when it cannot be read.
 */
export interface SourceAdapter {
  list(sourceId: string, date: string, signal?: AbortSignal): Promise<OpinionRef[]>;
}

export type CasePageTarget = Pick<Opinion, "sourceId" | "caseNumber" | "caseUrl">;

/** Reads the parties and their attorneys of record from a case's own page. */
export interface CasePartiesSource {
  fetchParties(target: CasePageTarget, signal?: AbortSignal): Promise<CaseParty[]>;
}

export interface DocketDocument {
  url: string;
  description: string;
}

export interface DocketCase {
  caseNumber: string;
  caseUrl?: string;
  disposition: string;
  documents: DocketDocument[];
}
