import type { AppConfig } from "../config";
import { SqliteLedger } from "./sqliteLedger";
import type { Ledger } from "./types";

export function createLedger(config: Pick<AppConfig, "ledgerPath">): Ledger {
  return new SqliteLedger(config.ledgerPath);
}

export { SqliteLedger } from "./sqliteLedger";
export type {
  AnalysisQuery,
  AnalysisReportRow,
  DownloadStateDetails,
  Ledger,
  LedgerStats,
  NewOpinion,
  RecordAnalysisOptions,
  UpsertResult,
} from "./types";
