import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AnalysisReportRow, NewOpinion, SqliteLedger } from "../ledger";
import { captureLogger, memoryLedger, testConfig } from "../testing/fakes";
import type { Analysis, Opinion } from "../types";
import { renderReport, resolveReportDate, uniqueReportPath, writeReport } from "./report";

const NOW = new Date("2025-07-28T08:00:00.000Z");

function opinion(overrides: Partial<Opinion>): Opinion {
  return {
    id: 1,
    sourceId: "coa01",
    caseNumber: "01-24-00001-CV",
    opinionType: "mem",
    publicationDate: "2025-07-24",
    listingUrl: "https://courts.test/Docket.aspx?coa=coa01&FullDate=07/24/2025",
    downloadState: "downloaded",
    downloadAttempts: 1,
    discoveredAt: "2025-07-25T08:00:00.000Z",
    ...overrides,
  };
}

function analysis(overrides: Partial<Analysis>): Analysis {
  return {
    opinionId: 1,
    engineModel: "test-model",
    rawResultText: "No interesting issues.",
    interestingIssueCount: 0,
    interesting: false,
    analyzedAt: "2025-07-25T10:00:00.000Z",
    ...overrides,
  };
}

describe("renderReport", () => {
  it("puts interesting cases first under their own heading", () => {
    const rows: AnalysisReportRow[] = [
      {
        opinion: opinion({
          id: 2,
          sourceId: "coa05",
          caseNumber: "05-24-00003-CR",
          opinionType: "op",
          caseUrl: "https://courts.test/Case.aspx?cn=05-24-00003-CR",
          directArtifactUrl: "https://courts.test/SearchMedia.aspx?MediaID=b",
          localArtifactPath: "data/opinions/coa05/b.pdf",
        }),
        analysis: analysis({ opinionId: 2, rawResultText: "## Issue 1\n▪ Issue Description: suppression", interestingIssueCount: 2, interesting: true }),
      },
      { opinion: opinion({}), analysis: analysis({}) },
    ];

    expect(renderReport(rows, "2025-07-24", "test-model", NOW)).toBe(
      [
        "# Opinion Analysis Report: 2025-07-24 Handdowns",
        "",
        "_This report is AI-generated by test-model to help reviewers find cases worth a closer look. Do not depend on it._",
        "",
        "| Total cases analyzed | 2 |",
        "| --- | --- |",
        "| Cases with interesting issues | 1 |",
        "| Report generated | 2025-07-28T08:00:00.000Z |",
        "",
        "## Cases with Interesting Legal Issues",
        "",
        "### ⭐ Case 1: 05-24-00003-CR (5th Court of Appeals (Dallas))",
        "",
        "- **Opinion type:** op",
        "- **Date:** 2025-07-24",
        "- **Issues found:** 2",
        "- **Case page:** https://courts.test/Case.aspx?cn=05-24-00003-CR",
        "- **Opinion PDF:** https://courts.test/SearchMedia.aspx?MediaID=b",
        "- **Local PDF:** data/opinions/coa05/b.pdf",
        "",
        "Issue 1\n▪ Issue Description: suppression",
        "",
        "## Cases with No Interesting Legal Issues",
        "",
        "### Case 2: 01-24-00001-CV (1st Court of Appeals (Houston))",
        "",
        "- **Opinion type:** mem",
        "- **Date:** 2025-07-24",
        "- **Issues found:** 0",
        "",
        "No interesting issues.",
        "",
      ].join("\n"),
    );
  });

  it("lists the parties of a case under its links", () => {
    const row: AnalysisReportRow = {
      opinion: opinion({ id: 4, caseNumber: "01-24-00004-CR" }),
      analysis: analysis({ opinionId: 4, rawResultText: "▪ Issue Description: venue", interestingIssueCount: 1, interesting: true }),
    };
    const parties = new Map([
      [4, [{ partyName: "Doe, John", partyType: "Criminal - Appellant", representatives: ["Jane Roe", "Sam Poe"] }]],
    ]);

    const markdown = renderReport([row], "2025-07-24", "test-model", NOW, parties);

    expect(markdown).toContain(
      [
        "- **Issues found:** 1",
        "- **Parties:**",
        "  - *Doe, John* (Criminal - Appellant): Jane Roe, Sam Poe",
        "",
        "▪ Issue Description: venue",
      ].join("\n"),
    );
  });

  it("omits the interesting heading when nothing qualifies", () => {
    const markdown = renderReport([{ opinion: opinion({}), analysis: analysis({}) }], "2025-07-24", "test-model", NOW);
    expect(markdown).not.toContain("## Cases with Interesting Legal Issues");
    expect(markdown).toContain("## Cases with No Interesting Legal Issues\n\n### Case 1: 01-24-00001-CV");
  });
});

describe("resolveReportDate", () => {
  const rows = (dates: string[]): AnalysisReportRow[] =>
    dates.map((publicationDate, index) => ({ opinion: opinion({ id: index + 1, publicationDate }), analysis: analysis({ opinionId: index + 1 }) }));

  it("prefers the requested date", () => {
    expect(resolveReportDate(rows(["2025-07-23"]), "2025-07-24", NOW)).toBe("2025-07-24");
  });

  it("uses the most common publication date, first seen on a tie", () => {
    expect(resolveReportDate(rows(["2025-07-23", "2025-07-24", "2025-07-24"]), undefined, NOW)).toBe("2025-07-24");
    expect(resolveReportDate(rows(["2025-07-23", "2025-07-24"]), undefined, NOW)).toBe("2025-07-23");
  });

  it("falls back to today without rows", () => {
    expect(resolveReportDate([], undefined, NOW)).toBe("2025-07-28");
  });
});

describe("writeReport", () => {
  let workDir: string;
  let ledger: SqliteLedger;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "reports-"));
    ledger = memoryLedger();
  });

  afterEach(async () => {
    await ledger.close();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function deps() {
    const config = testConfig({ outputDirs: { opinions: workDir, reports: path.join(workDir, "reports"), manifests: workDir } });
    return { config, ledger, logger: captureLogger("report").logger };
  }

  async function analyzed(input: Pick<NewOpinion, "caseNumber" | "publicationDate">, interesting: boolean): Promise<void> {
    const { id } = await ledger.upsertOpinion({
      sourceId: "coa01",
      opinionType: "op",
      listingUrl: "https://courts.test/Docket.aspx?coa=coa01",
      ...input,
    });
    await ledger.updateDownloadState(id, "downloaded", { localArtifactPath: `${workDir}/${id}.pdf`, attempts: 1 });
    await ledger.recordAnalysis(analysis({ opinionId: id, interesting, interestingIssueCount: interesting ? 1 : 0 }));
  }

  it("writes the report under the dominant date and never overwrites one", async () => {
    await analyzed({ caseNumber: "01-24-00001-CR", publicationDate: "2025-07-24" }, true);
    await analyzed({ caseNumber: "01-24-00002-CR", publicationDate: "2025-07-24" }, false);
    await analyzed({ caseNumber: "01-24-00003-CR", publicationDate: "2025-07-23" }, false);

    const first = await writeReport(deps(), { now: NOW });
    const second = await writeReport(deps(), { now: NOW });

    expect(first).toEqual({
      path: path.join(workDir, "reports", "opinion_report_20250724.md"),
      reportDate: "2025-07-24",
      total: 3,
      interesting: 1,
    });
    expect(second?.path).toBe(path.join(workDir, "reports", "opinion_report_20250724-1.md"));
    expect(fs.readFileSync(first?.path ?? "", "utf-8")).toContain("### ⭐ Case 1: 01-24-00001-CR (1st Court of Appeals (Houston))");
  });

  it("includes recorded parties for interesting cases only", async () => {
    await analyzed({ caseNumber: "01-24-00001-CR", publicationDate: "2025-07-24" }, true);
    await analyzed({ caseNumber: "01-24-00002-CR", publicationDate: "2025-07-24" }, false);
    await ledger.recordRepresentatives({ sourceId: "coa01", caseNumber: "01-24-00001-CR" }, [
      { partyName: "Doe, John", partyType: "Criminal - Appellant", representatives: ["Jane Roe"] },
    ]);
    await ledger.recordRepresentatives({ sourceId: "coa01", caseNumber: "01-24-00002-CR" }, [
      { partyName: "Poe, Ann", partyType: "Criminal - Appellant", representatives: ["Sam Poe"] },
    ]);

    const result = await writeReport(deps(), { now: NOW });
    const markdown = fs.readFileSync(result?.path ?? "", "utf-8");

    expect(markdown).toContain("- **Parties:**\n  - *Doe, John* (Criminal - Appellant): Jane Roe\n");
    expect(markdown).not.toContain("Poe, Ann");
  });

  it("restricts the report to one publication date", async () => {
    await analyzed({ caseNumber: "01-24-00001-CR", publicationDate: "2025-07-24" }, true);
    await analyzed({ caseNumber: "01-24-00003-CR", publicationDate: "2025-07-23" }, false);

    const result = await writeReport(deps(), { date: "2025-07-23", now: NOW });

    expect(result).toMatchObject({ reportDate: "2025-07-23", total: 1, interesting: 0 });
  });

  it("writes nothing when there are no analyses", async () => {
    expect(await writeReport(deps(), { now: NOW })).toBeUndefined();
    expect(fs.existsSync(path.join(workDir, "reports"))).toBe(false);
  });
});

describe("uniqueReportPath", () => {
  it("numbers the name past existing files", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "unique-"));
    try {
      fs.writeFileSync(path.join(dir, "r.md"), "");
      fs.writeFileSync(path.join(dir, "r-1.md"), "");
      expect(uniqueReportPath(dir, "r")).toBe(path.join(dir, "r-2.md"));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
