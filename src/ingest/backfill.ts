import type { AppConfig } from "../config";
import { sleep as defaultSleep, type SleepFn } from "../core/concurrency";
import { errorMessage, OperationCancelledError } from "../core/errors";
import type { Ledger } from "../ledger";
import type { Logger } from "../observability";
import type { SourceAdapter } from "../sources";
import type { Opinion } from "../types";

export interface BackfillDependencies {
  config: Pick<AppConfig, "sourceDelayMs">;
  ledger: Ledger;
  adapter: SourceAdapter;
  logger: Logger;
  sleep?: SleepFn;
}

export interface BackfillStats {
  candidates: number;
  listingsFetched: number;
  listingsFailed: number;
  filled: number;
  unmatched: number;
  cancelled: boolean;
}

function groupByListing(opinions: Opinion[]): Map<string, Opinion[]> {
  const groups = new Map<string, Opinion[]>();
  for (const opinion of opinions) {
    const key = `${opinion.sourceId}|${opinion.publicationDate}`;
    const group = groups.get(key) ?? [];
    group.push(opinion);
    groups.set(key, group);
  }
  return groups;
}

/**
 * Re-lists each (source, date) that has opinions without a direct document link and fills the
 * link where the listing still shows the document. Existing links are never replaced.
 */
export async function backfillDirectUrls(deps: BackfillDependencies, signal?: AbortSignal): Promise<BackfillStats> {
  const { ledger, adapter, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const missing = await ledger.findMissingDirectUrls();
  const stats: BackfillStats = {
    candidates: missing.length,
    listingsFetched: 0,
    listingsFailed: 0,
    filled: 0,
    unmatched: 0,
    cancelled: false,
  };

  if (missing.length === 0) {
    logger.info("backfill_nothing_to_do");
    return stats;
  }

  logger.info("backfill_start", { candidates: missing.length });
  let index = 0;
  for (const opinions of groupByListing(missing).values()) {
    if (index > 0) {
      await sleep(deps.config.sourceDelayMs, signal);
    }
    index += 1;
    if (signal?.aborted) {
      stats.cancelled = true;
      break;
    }

    const { sourceId, publicationDate } = opinions[0];
    let urls: Map<string, string>;
    try {
      const refs = await adapter.list(sourceId, publicationDate, signal);
      urls = new Map(refs.map((ref) => [`${ref.caseNumber}|${ref.opinionType}`, ref.documentUrl]));
      stats.listingsFetched += 1;
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        stats.cancelled = true;
        break;
      }
      stats.listingsFailed += 1;
      logger.warn("backfill_listing_failed", { sourceId, date: publicationDate, error: errorMessage(error) });
      continue;
    }

    for (const opinion of opinions) {
      const url = urls.get(`${opinion.caseNumber}|${opinion.opinionType}`);
      if (!url) {
        stats.unmatched += 1;
        logger.debug("backfill_no_match", { opinionId: opinion.id, sourceId, caseNumber: opinion.caseNumber });
        continue;
      }
      if (await ledger.backfillDirectUrl(opinion.id, url)) {
        stats.filled += 1;
        logger.info("backfill_filled", { opinionId: opinion.id, sourceId, caseNumber: opinion.caseNumber, url });
      }
    }
  }

  logger.info("backfill_complete", { ...stats });
  return stats;
}
