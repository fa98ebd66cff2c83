import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { NewOpinion, SqliteLedger } from "../ledger";
import type { SourceAdapter } from "../sources";
import { captureLogger, memoryLedger, recordingSleep } from "../testing/fakes";
import type { OpinionRef } from "../types";
import { backfillDirectUrls } from "./backfill";

const DATE = "2025-07-24";

function listed(sourceId: string, caseNumber: string, opinionType: string): NewOpinion {
  return {
    sourceId,
    caseNumber,
    opinionType,
    publicationDate: DATE,
    listingUrl: `https://courts.test/Docket.aspx?coa=${sourceId}&FullDate=07/24/2025`,
  };
}

function ref(opinion: NewOpinion, documentUrl: string): OpinionRef {
  return { ...opinion, documentUrl };
}

class ListingAdapter implements SourceAdapter {
  readonly listed: Array<{ sourceId: string; date: string }> = [];

  constructor(private readonly listings: Record<string, OpinionRef[] | Error>) {}

  async list(sourceId: string, date: string): Promise<OpinionRef[]> {
    this.listed.push({ sourceId, date });
    const listing = this.listings[sourceId] ?? [];
    if (listing instanceof Error) {
      throw listing;
    }
    return listing;
  }
}

describe("backfillDirectUrls", () => {
  let ledger: SqliteLedger;

  beforeEach(() => {
    ledger = memoryLedger();
  });

  afterEach(async () => {
    await ledger.close();
  });

  it("lists each source and date once and fills the links it finds", async () => {
    const first = listed("coa01", "01-24-00001-CR", "mem");
    const second = listed("coa01", "01-24-00002-CV", "op");
    const third = listed("coa05", "05-24-00003-CR", "op");
    const firstId = (await ledger.upsertOpinion(first)).id;
    const secondId = (await ledger.upsertOpinion(second)).id;
    await ledger.upsertOpinion(third);
    await ledger.upsertOpinion({ ...listed("coa01", "01-24-00009-CR", "op"), directArtifactUrl: "https://courts.test/SearchMedia.aspx?MediaID=known" });

    const adapter = new ListingAdapter({
      coa01: [ref(first, "https://courts.test/SearchMedia.aspx?MediaID=one"), ref({ ...second, opinionType: "cnc" }, "https://courts.test/SearchMedia.aspx?MediaID=two")],
      coa05: new Error("HTTP 503"),
    });
    const sleep = recordingSleep();
    const { logger, lines } = captureLogger("backfill");

    const stats = await backfillDirectUrls({ config: { sourceDelayMs: 700 }, ledger, adapter, logger, sleep: sleep.sleep });

    expect(stats).toEqual({ candidates: 3, listingsFetched: 1, listingsFailed: 1, filled: 1, unmatched: 1, cancelled: false });
    expect(adapter.listed).toEqual([
      { sourceId: "coa01", date: DATE },
      { sourceId: "coa05", date: DATE },
    ]);
    expect(sleep.delays).toEqual([700]);
    expect((await ledger.getOpinion(firstId))?.directArtifactUrl).toBe("https://courts.test/SearchMedia.aspx?MediaID=one");
    expect((await ledger.getOpinion(secondId))?.directArtifactUrl).toBeUndefined();
    expect(lines.find((line) => line.msg === "backfill_listing_failed")).toMatchObject({ sourceId: "coa05", error: "HTTP 503" });
  });

  it("does nothing when every opinion has a link", async () => {
    await ledger.upsertOpinion({ ...listed("coa01", "01-24-00001-CR", "op"), directArtifactUrl: "https://courts.test/SearchMedia.aspx?MediaID=a" });
    const adapter = new ListingAdapter({});
    const { logger, lines } = captureLogger("backfill");

    const stats = await backfillDirectUrls({ config: { sourceDelayMs: 0 }, ledger, adapter, logger });

    expect(stats.candidates).toBe(0);
    expect(adapter.listed).toEqual([]);
    expect(lines.map((line) => line.msg)).toEqual(["backfill_nothing_to_do"]);
  });

  it("stops before listing when cancelled", async () => {
    await ledger.upsertOpinion(listed("coa01", "01-24-00001-CR", "op"));
    const adapter = new ListingAdapter({});
    const controller = new AbortController();
    controller.abort();

    const stats = await backfillDirectUrls(
      { config: { sourceDelayMs: 0 }, ledger, adapter, logger: captureLogger().logger },
      controller.signal,
    );

    expect(stats).toMatchObject({ candidates: 1, listingsFetched: 0, cancelled: true });
    expect(adapter.listed).toEqual([]);
  });
});
