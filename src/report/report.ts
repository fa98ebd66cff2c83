import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { parseIsoDate, toCompactDate } from "../core/dates";
import type { AnalysisReportRow, Ledger } from "../ledger";
import type { Logger } from "../observability";
import { courtName } from "../sources";
import type { CaseParty } from "../types";

export interface ReportOptions {
  /** Restrict to one publication date; all dates when absent. */
  date?: string;
  now?: Date;
}

export interface ReportResult {
  path: string;
  reportDate: string;
  total: number;
  interesting: number;
}

/** The requested date, else the publication date most rows share (first seen wins a tie). */
export function resolveReportDate(rows: AnalysisReportRow[], date: string | undefined, now: Date): string {
  if (date) {
    return parseIsoDate(date);
  }
  const counts = new Map<string, number>();
  let best: string | undefined;
  let bestCount = 0;
  for (const { opinion } of rows) {
    const count = (counts.get(opinion.publicationDate) ?? 0) + 1;
    counts.set(opinion.publicationDate, count);
    if (count > bestCount) {
      best = opinion.publicationDate;
      bestCount = count;
    }
  }
  return best ?? now.toISOString().slice(0, 10);
}

/** Drops markdown headings so analysis text nests under the case heading. */
function flattenHeadings(text: string): string {
  return text.replace(/^#+\s*/gm, "").trim();
}

/** Parties of interesting cases, by opinion id. */
export type PartiesByOpinion = ReadonlyMap<number, CaseParty[]>;

function renderCase(row: AnalysisReportRow, index: number, parties: CaseParty[]): string[] {
  const { opinion, analysis } = row;
  const star = analysis.interesting ? "⭐ " : "";
  const lines = [
    `### ${star}Case ${index + 1}: ${opinion.caseNumber} (${courtName(opinion.sourceId)})`,
    "",
    `- **Opinion type:** ${opinion.opinionType}`,
    `- **Date:** ${opinion.publicationDate}`,
    `- **Issues found:** ${analysis.interestingIssueCount}`,
  ];
  if (opinion.caseUrl) {
    lines.push(`- **Case page:** ${opinion.caseUrl}`);
  }
  if (opinion.directArtifactUrl) {
    lines.push(`- **Opinion PDF:** ${opinion.directArtifactUrl}`);
  }
  if (opinion.localArtifactPath) {
    lines.push(`- **Local PDF:** ${opinion.localArtifactPath}`);
  }
  if (parties.length > 0) {
    lines.push("- **Parties:**");
    for (const party of parties) {
      lines.push(`  - *${party.partyName}* (${party.partyType}): ${party.representatives.join(", ")}`);
    }
  }
  lines.push("", flattenHeadings(analysis.rawResultText), "");
  return lines;
}

/** Markdown report: interesting cases first, then the rest under their own heading. */
export function renderReport(
  rows: AnalysisReportRow[],
  reportDate: string,
  engineModel: string,
  now: Date,
  parties: PartiesByOpinion = new Map(),
): string {
  const interesting = rows.filter((row) => row.analysis.interesting).length;
  const lines = [
    `# Opinion Analysis Report: ${reportDate} Handdowns`,
    "",
    `_This report is AI-generated by ${engineModel} to help reviewers find cases worth a closer look. Do not depend on it._`,
    "",
    `| Total cases analyzed | ${rows.length} |`,
    "| --- | --- |",
    `| Cases with interesting issues | ${interesting} |`,
    `| Report generated | ${now.toISOString()} |`,
    "",
  ];

  if (interesting > 0) {
    lines.push("## Cases with Interesting Legal Issues", "");
  }
  let otherHeaderAdded = false;
  rows.forEach((row, index) => {
    if (!row.analysis.interesting && !otherHeaderAdded) {
      lines.push("## Cases with No Interesting Legal Issues", "");
      otherHeaderAdded = true;
    }
    lines.push(...renderCase(row, index, parties.get(row.opinion.id) ?? []));
  });

  return `${lines.join("\n").trimEnd()}\n`;
}

/** `base.md`, else `base-1.md`, `base-2.md`, ... */
export function uniqueReportPath(directory: string, baseName: string): string {
  const candidate = path.join(directory, `${baseName}.md`);
  if (!fs.existsSync(candidate)) {
    return candidate;
  }
  for (let counter = 1; ; counter += 1) {
    const next = path.join(directory, `${baseName}-${counter}.md`);
    if (!fs.existsSync(next)) {
      return next;
    }
  }
}

export interface ReportDependencies {
  config: Pick<AppConfig, "outputDirs" | "analysisModel">;
  ledger: Ledger;
  logger: Logger;
}

/** Writes the report and returns where; undefined when nothing has been analyzed for the selection. */
export async function writeReport(deps: ReportDependencies, options: ReportOptions = {}): Promise<ReportResult | undefined> {
  const { config, ledger, logger } = deps;
  const now = options.now ?? new Date();
  const publicationDate = options.date ? parseIsoDate(options.date) : undefined;
  const rows = await ledger.listAnalyses({ publicationDate, interestingOnly: false });

  if (rows.length === 0) {
    logger.info("report_empty", { date: publicationDate });
    return undefined;
  }

  const reportDate = resolveReportDate(rows, publicationDate, now);
  const engineModel = rows[0].analysis.engineModel || config.analysisModel;
  const parties = new Map<number, CaseParty[]>();
  for (const { opinion, analysis } of rows) {
    if (analysis.interesting) {
      parties.set(opinion.id, await ledger.listRepresentatives(opinion));
    }
  }
  const markdown = renderReport(rows, reportDate, engineModel, now, parties);

  fs.mkdirSync(config.outputDirs.reports, { recursive: true });
  const outputPath = uniqueReportPath(config.outputDirs.reports, `opinion_report_${toCompactDate(reportDate)}`);
  fs.writeFileSync(outputPath, markdown, "utf-8");

  const result: ReportResult = {
    path: outputPath,
    reportDate,
    total: rows.length,
    interesting: rows.filter((row) => row.analysis.interesting).length,
  };
  logger.info("report_written", { ...result });
  return result;
}
