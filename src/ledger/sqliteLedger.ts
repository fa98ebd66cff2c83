import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { PersistenceError } from "../core/errors";
import type { Analysis, CaseIdentity, CaseParty, DownloadState, Opinion, OpinionIdentity, RunMode, RunOutcome, RunSummary } from "../types";
import { createRunId } from "../observability/runId";
import type {
  AnalysisQuery,
  AnalysisReportRow,
  DownloadStateDetails,
  Ledger,
  LedgerStats,
  NewOpinion,
  RecordAnalysisOptions,
  UpsertResult,
} from "./types";

type OpinionRow = {
  id: number;
  sourceId: string;
  caseNumber: string;
  opinionType: string;
  publicationDate: string;
  listingUrl: string;
  directArtifactUrl: string | null;
  caseUrl: string | null;
  description: string | null;
  localArtifactPath: string | null;
  contentHash: string | null;
  downloadState: string;
  downloadAttempts: number;
  lastError: string | null;
  discoveredAt: string;
  downloadedAt: string | null;
};

type AnalysisRow = {
  opinionId: number;
  engineModel: string;
  rawResultText: string;
  interestingIssueCount: number;
  interesting: number;
  analyzedAt: string;
};

type RepresentativeRow = {
  partyName: string;
  partyType: string;
  representativeNames: string;
};

const RepresentativeNamesSchema = z.array(z.string());

type RunRow = {
  runId: string;
  mode: string;
  targetDate: string | null;
  startedAt: string;
  finishedAt: string | null;
  sourcesChecked: number;
  sourcesFailed: number;
  opinionsDiscovered: number;
  opinionsDownloaded: number;
  opinionsFailed: number;
  analysesCompleted: number;
  analysesFailed: number;
  outcome: string;
  errorMessage: string | null;
};

const OPINION_COLUMNS = `
  o.id, o.sourceId, o.caseNumber, o.opinionType, o.publicationDate, o.listingUrl,
  o.directArtifactUrl, o.caseUrl, o.description, o.localArtifactPath, o.contentHash,
  o.downloadState, o.downloadAttempts, o.lastError, o.discoveredAt, o.downloadedAt
`;

function parseDownloadState(value: string): DownloadState {
  if (value === "discovered" || value === "downloaded" || value === "download_failed") {
    return value;
  }
  throw new Error(`unknown download state '${value}'`);
}

function parseRunMode(value: string): RunMode {
  if (value === "scrape_only" || value === "analyze_only" || value === "both") {
    return value;
  }
  throw new Error(`unknown run mode '${value}'`);
}

function parseRunOutcome(value: string): RunOutcome {
  if (value === "running" || value === "success" || value === "partial_failure" || value === "failure") {
    return value;
  }
  throw new Error(`unknown run outcome '${value}'`);
}

function toOpinion(row: OpinionRow): Opinion {
  return {
    id: row.id,
    sourceId: row.sourceId,
    caseNumber: row.caseNumber,
    opinionType: row.opinionType,
    publicationDate: row.publicationDate,
    listingUrl: row.listingUrl,
    directArtifactUrl: row.directArtifactUrl ?? undefined,
    caseUrl: row.caseUrl ?? undefined,
    description: row.description ?? undefined,
    localArtifactPath: row.localArtifactPath ?? undefined,
    contentHash: row.contentHash ?? undefined,
    downloadState: parseDownloadState(row.downloadState),
    downloadAttempts: row.downloadAttempts,
    lastError: row.lastError ?? undefined,
    discoveredAt: row.discoveredAt,
    downloadedAt: row.downloadedAt ?? undefined,
  };
}

function toAnalysis(row: AnalysisRow): Analysis {
  return {
    opinionId: row.opinionId,
    engineModel: row.engineModel,
    rawResultText: row.rawResultText,
    interestingIssueCount: row.interestingIssueCount,
    interesting: row.interesting === 1,
    analyzedAt: row.analyzedAt,
  };
}

function toCaseParty(row: RepresentativeRow): CaseParty {
  return {
    partyName: row.partyName,
    partyType: row.partyType,
    representatives: RepresentativeNamesSchema.parse(JSON.parse(row.representativeNames)),
  };
}

function toRunSummary(row: RunRow): RunSummary {
  return {
    runId: row.runId,
    mode: parseRunMode(row.mode),
    targetDate: row.targetDate ?? undefined,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    sourcesChecked: row.sourcesChecked,
    sourcesFailed: row.sourcesFailed,
    opinionsDiscovered: row.opinionsDiscovered,
    opinionsDownloaded: row.opinionsDownloaded,
    opinionsFailed: row.opinionsFailed,
    analysesCompleted: row.analysesCompleted,
    analysesFailed: row.analysesFailed,
    outcome: parseRunOutcome(row.outcome),
    errorMessage: row.errorMessage ?? undefined,
  };
}

function limitClause(limit?: number): string {
  return limit !== undefined && limit > 0 ? `LIMIT ${Math.floor(limit)}` : "";
}

export class SqliteLedger implements Ledger {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    try {
      if (dbPath === ":memory:") {
        this.db = new Database(dbPath);
      } else {
        const absolutePath = path.resolve(dbPath);
        fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
        this.db = new Database(absolutePath);
        this.db.pragma("journal_mode = WAL");
      }
      this.db.pragma("foreign_keys = ON");
      this.initializeSchema();
    } catch (error) {
      throw new PersistenceError("open", error);
    }
  }

  async upsertOpinion(input: NewOpinion): Promise<UpsertResult> {
    return this.guard("upsertOpinion", () => {
      const select = this.db.prepare<[string, string, string], OpinionRow>(
        `SELECT ${OPINION_COLUMNS} FROM opinions o WHERE o.sourceId = ? AND o.caseNumber = ? AND o.opinionType = ?`,
      );

      const tx = this.db.transaction((): UpsertResult => {
        const existing = select.get(input.sourceId, input.caseNumber, input.opinionType);
        if (existing) {
          // Only backfillable fields may change on rediscovery, and only from null or empty.
          this.db
            .prepare(
              `
              UPDATE opinions
              SET
                directArtifactUrl = COALESCE(NULLIF(directArtifactUrl, ''), @directArtifactUrl),
                caseUrl = COALESCE(NULLIF(caseUrl, ''), @caseUrl),
                description = COALESCE(NULLIF(description, ''), @description)
              WHERE id = @id
            `,
            )
            .run({
              id: existing.id,
              directArtifactUrl: input.directArtifactUrl ?? null,
              caseUrl: input.caseUrl ?? null,
              description: input.description ?? null,
            });
          const refreshed = select.get(input.sourceId, input.caseNumber, input.opinionType) ?? existing;
          return { id: existing.id, wasNew: false, opinion: toOpinion(refreshed) };
        }

        const now = new Date().toISOString();
        const info = this.db
          .prepare(
            `
            INSERT INTO opinions (
              sourceId, caseNumber, opinionType, publicationDate, listingUrl,
              directArtifactUrl, caseUrl, description, downloadState, downloadAttempts,
              discoveredAt, updatedAt
            )
            VALUES (
              @sourceId, @caseNumber, @opinionType, @publicationDate, @listingUrl,
              @directArtifactUrl, @caseUrl, @description, 'discovered', 0,
              @discoveredAt, @updatedAt
            )
          `,
          )
          .run({
            sourceId: input.sourceId,
            caseNumber: input.caseNumber,
            opinionType: input.opinionType,
            publicationDate: input.publicationDate,
            listingUrl: input.listingUrl,
            directArtifactUrl: input.directArtifactUrl ?? null,
            caseUrl: input.caseUrl ?? null,
            description: input.description ?? null,
            discoveredAt: input.discoveredAt ?? now,
            updatedAt: now,
          });

        const inserted = select.get(input.sourceId, input.caseNumber, input.opinionType);
        if (!inserted) {
          throw new Error(`opinion ${String(info.lastInsertRowid)} vanished after insert`);
        }
        return { id: inserted.id, wasNew: true, opinion: toOpinion(inserted) };
      });

      return tx.immediate();
    });
  }

  async updateDownloadState(id: number, state: DownloadState, details: DownloadStateDetails = {}): Promise<void> {
    this.guard("updateDownloadState", () => {
      const at = details.at ?? new Date().toISOString();
      const info = this.db
        .prepare(
          `
          UPDATE opinions
          SET
            downloadState = @state,
            localArtifactPath = CASE WHEN @state = 'downloaded' THEN @localArtifactPath ELSE NULL END,
            contentHash = CASE WHEN @state = 'downloaded' THEN @contentHash ELSE NULL END,
            downloadedAt = CASE WHEN @state = 'downloaded' THEN @at ELSE NULL END,
            lastError = @error,
            downloadAttempts = downloadAttempts + @attempts,
            updatedAt = @at
          WHERE id = @id
        `,
        )
        .run({
          id,
          state,
          localArtifactPath: details.localArtifactPath ?? null,
          contentHash: details.contentHash ?? null,
          error: state === "downloaded" ? null : (details.error ?? null),
          attempts: details.attempts ?? 0,
          at,
        });

      if (info.changes === 0) {
        throw new Error(`opinion ${id} not found`);
      }
    });
  }

  async getOpinion(id: number): Promise<Opinion | undefined> {
    return this.guard("getOpinion", () => {
      const row = this.db.prepare<[number], OpinionRow>(`SELECT ${OPINION_COLUMNS} FROM opinions o WHERE o.id = ?`).get(id);
      return row ? toOpinion(row) : undefined;
    });
  }

  async findOpinion(identity: OpinionIdentity): Promise<Opinion | undefined> {
    return this.guard("findOpinion", () => {
      const row = this.db
        .prepare<[string, string, string], OpinionRow>(
          `SELECT ${OPINION_COLUMNS} FROM opinions o WHERE o.sourceId = ? AND o.caseNumber = ? AND o.opinionType = ?`,
        )
        .get(identity.sourceId, identity.caseNumber, identity.opinionType);
      return row ? toOpinion(row) : undefined;
    });
  }

  async findUndownloaded(sourceFilter?: readonly string[]): Promise<Opinion[]> {
    return this.guard("findUndownloaded", () => {
      const filter = sourceFilter && sourceFilter.length > 0 ? [...sourceFilter] : undefined;
      const placeholders = filter ? filter.map(() => "?").join(", ") : "";
      const rows = this.db
        .prepare<string[], OpinionRow>(
          `
          SELECT ${OPINION_COLUMNS}
          FROM opinions o
          WHERE o.downloadState != 'downloaded'
            ${filter ? `AND o.sourceId IN (${placeholders})` : ""}
          ORDER BY o.discoveredAt ASC, o.id ASC
        `,
        )
        .all(...(filter ?? []));
      return rows.map(toOpinion);
    });
  }

  async findUnanalyzed(limit?: number): Promise<Opinion[]> {
    return this.guard("findUnanalyzed", () => {
      const rows = this.db
        .prepare<[], OpinionRow>(
          `
          SELECT ${OPINION_COLUMNS}
          FROM opinions o
          LEFT JOIN analyses a ON a.opinionId = o.id
          WHERE o.downloadState = 'downloaded' AND a.opinionId IS NULL
          ORDER BY o.discoveredAt ASC, o.id ASC
          ${limitClause(limit)}
        `,
        )
        .all();
      return rows.map(toOpinion);
    });
  }

  async findAnalyzed(limit?: number): Promise<Opinion[]> {
    return this.guard("findAnalyzed", () => {
      const rows = this.db
        .prepare<[], OpinionRow>(
          `
          SELECT ${OPINION_COLUMNS}
          FROM opinions o
          JOIN analyses a ON a.opinionId = o.id
          WHERE o.downloadState = 'downloaded'
          ORDER BY o.discoveredAt ASC, o.id ASC
          ${limitClause(limit)}
        `,
        )
        .all();
      return rows.map(toOpinion);
    });
  }

  async findMissingDirectUrls(): Promise<Opinion[]> {
    return this.guard("findMissingDirectUrls", () => {
      const rows = this.db
        .prepare<[], OpinionRow>(
          `
          SELECT ${OPINION_COLUMNS}
          FROM opinions o
          WHERE o.directArtifactUrl IS NULL OR o.directArtifactUrl = ''
          ORDER BY o.sourceId ASC, o.publicationDate ASC, o.id ASC
        `,
        )
        .all();
      return rows.map(toOpinion);
    });
  }

  async backfillDirectUrl(id: number, url: string): Promise<boolean> {
    return this.guard("backfillDirectUrl", () => {
      const info = this.db
        .prepare(
          `
          UPDATE opinions
          SET directArtifactUrl = @url
          WHERE id = @id AND (directArtifactUrl IS NULL OR directArtifactUrl = '')
        `,
        )
        .run({ id, url });
      return info.changes > 0;
    });
  }

  async recordAnalysis(analysis: Analysis, options: RecordAnalysisOptions = {}): Promise<boolean> {
    return this.guard("recordAnalysis", () => {
      const tx = this.db.transaction((): boolean => {
        const owner = this.db
          .prepare<[number], { downloadState: string }>("SELECT downloadState FROM opinions WHERE id = ?")
          .get(analysis.opinionId);
        if (!owner) {
          throw new Error(`opinion ${analysis.opinionId} not found`);
        }
        if (owner.downloadState !== "downloaded") {
          throw new Error(`opinion ${analysis.opinionId} is ${owner.downloadState}, analyses need a downloaded opinion`);
        }

        const conflictClause = options.replace
          ? `DO UPDATE SET
              engineModel = excluded.engineModel,
              rawResultText = excluded.rawResultText,
              interestingIssueCount = excluded.interestingIssueCount,
              interesting = excluded.interesting,
              analyzedAt = excluded.analyzedAt`
          : "DO NOTHING";

        const info = this.db
          .prepare(
            `
            INSERT INTO analyses (opinionId, engineModel, rawResultText, interestingIssueCount, interesting, analyzedAt)
            VALUES (@opinionId, @engineModel, @rawResultText, @interestingIssueCount, @interesting, @analyzedAt)
            ON CONFLICT(opinionId) ${conflictClause}
          `,
          )
          .run({
            opinionId: analysis.opinionId,
            engineModel: analysis.engineModel,
            rawResultText: analysis.rawResultText,
            interestingIssueCount: analysis.interestingIssueCount,
            interesting: analysis.interesting ? 1 : 0,
            analyzedAt: analysis.analyzedAt,
          });
        return info.changes > 0;
      });

      return tx.immediate();
    });
  }

  async getAnalysis(opinionId: number): Promise<Analysis | undefined> {
    return this.guard("getAnalysis", () => {
      const row = this.db
        .prepare<[number], AnalysisRow>(
          "SELECT opinionId, engineModel, rawResultText, interestingIssueCount, interesting, analyzedAt FROM analyses WHERE opinionId = ?",
        )
        .get(opinionId);
      return row ? toAnalysis(row) : undefined;
    });
  }

  async listAnalyses(query: AnalysisQuery): Promise<AnalysisReportRow[]> {
    return this.guard("listAnalyses", () => {
      const conditions: string[] = [];
      const params: string[] = [];
      if (query.interestingOnly) {
        conditions.push("a.interesting = 1");
      }
      if (query.publicationDate) {
        conditions.push("o.publicationDate = ?");
        params.push(query.publicationDate);
      }

      const rows = this.db
        .prepare<string[], OpinionRow & { engineModel: string; rawResultText: string; interestingIssueCount: number; interesting: number; analyzedAt: string }>(
          `
          SELECT ${OPINION_COLUMNS},
            a.engineModel, a.rawResultText, a.interestingIssueCount, a.interesting, a.analyzedAt
          FROM analyses a
          JOIN opinions o ON o.id = a.opinionId
          ${conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : ""}
          ORDER BY a.interesting DESC, o.publicationDate DESC, o.caseNumber ASC, o.opinionType ASC
        `,
        )
        .all(...params);

      return rows.map((row) => ({
        opinion: toOpinion(row),
        analysis: toAnalysis({ ...row, opinionId: row.id }),
      }));
    });
  }

  async recordRepresentatives(caseRef: CaseIdentity, parties: CaseParty[], fetchedAt?: string): Promise<number> {
    return this.guard("recordRepresentatives", () => {
      const upsert = this.db.prepare(
        `
        INSERT INTO representatives (sourceId, caseNumber, partyName, partyType, representativeNames, fetchedAt)
        VALUES (@sourceId, @caseNumber, @partyName, @partyType, @representativeNames, @fetchedAt)
        ON CONFLICT(sourceId, caseNumber, partyName) DO UPDATE SET
          partyType = excluded.partyType,
          representativeNames = excluded.representativeNames,
          fetchedAt = excluded.fetchedAt
      `,
      );
      const at = fetchedAt ?? new Date().toISOString();

      const tx = this.db.transaction((): number => {
        for (const party of parties) {
          upsert.run({
            sourceId: caseRef.sourceId,
            caseNumber: caseRef.caseNumber,
            partyName: party.partyName,
            partyType: party.partyType,
            representativeNames: JSON.stringify(party.representatives),
            fetchedAt: at,
          });
        }
        return parties.length;
      });

      return tx.immediate();
    });
  }

  async listRepresentatives(caseRef: CaseIdentity): Promise<CaseParty[]> {
    return this.guard("listRepresentatives", () => {
      const rows = this.db
        .prepare<[string, string], RepresentativeRow>(
          `
          SELECT partyName, partyType, representativeNames
          FROM representatives
          WHERE sourceId = ? AND caseNumber = ?
          ORDER BY partyType ASC, partyName ASC
        `,
        )
        .all(caseRef.sourceId, caseRef.caseNumber);
      return rows.map(toCaseParty);
    });
  }

  async startRun(mode: RunMode, targetDate?: string, runId?: string): Promise<RunSummary> {
    return this.guard("startRun", () => {
      const summary: RunSummary = {
        runId: runId ?? createRunId(),
        mode,
        targetDate,
        startedAt: new Date().toISOString(),
        sourcesChecked: 0,
        sourcesFailed: 0,
        opinionsDiscovered: 0,
        opinionsDownloaded: 0,
        opinionsFailed: 0,
        analysesCompleted: 0,
        analysesFailed: 0,
        outcome: "running",
      };

      this.db
        .prepare(
          `
          INSERT INTO runs (runId, mode, targetDate, startedAt, outcome)
          VALUES (@runId, @mode, @targetDate, @startedAt, 'running')
        `,
        )
        .run({
          runId: summary.runId,
          mode,
          targetDate: targetDate ?? null,
          startedAt: summary.startedAt,
        });

      return summary;
    });
  }

  async finalizeRun(summary: RunSummary): Promise<void> {
    this.guard("finalizeRun", () => {
      if (summary.outcome === "running") {
        throw new Error(`run ${summary.runId} cannot be finalized while still running`);
      }

      const info = this.db
        .prepare(
          `
          UPDATE runs
          SET
            finishedAt = @finishedAt,
            sourcesChecked = @sourcesChecked,
            sourcesFailed = @sourcesFailed,
            opinionsDiscovered = @opinionsDiscovered,
            opinionsDownloaded = @opinionsDownloaded,
            opinionsFailed = @opinionsFailed,
            analysesCompleted = @analysesCompleted,
            analysesFailed = @analysesFailed,
            outcome = @outcome,
            errorMessage = @errorMessage
          WHERE runId = @runId AND finishedAt IS NULL
        `,
        )
        .run({
          runId: summary.runId,
          finishedAt: summary.finishedAt ?? new Date().toISOString(),
          sourcesChecked: summary.sourcesChecked,
          sourcesFailed: summary.sourcesFailed,
          opinionsDiscovered: summary.opinionsDiscovered,
          opinionsDownloaded: summary.opinionsDownloaded,
          opinionsFailed: summary.opinionsFailed,
          analysesCompleted: summary.analysesCompleted,
          analysesFailed: summary.analysesFailed,
          outcome: summary.outcome,
          errorMessage: summary.errorMessage ?? null,
        });

      if (info.changes === 0) {
        throw new Error(`run ${summary.runId} is unknown or already finalized`);
      }
    });
  }

  async getRun(runId: string): Promise<RunSummary | undefined> {
    return this.guard("getRun", () => {
      const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE runId = ?").get(runId);
      return row ? toRunSummary(row) : undefined;
    });
  }

  async listRecentRuns(limit: number): Promise<RunSummary[]> {
    return this.guard("listRecentRuns", () => {
      const rows = this.db.prepare<[number], RunRow>("SELECT * FROM runs ORDER BY startedAt DESC LIMIT ?").all(limit);
      return rows.map(toRunSummary);
    });
  }

  async getStats(): Promise<LedgerStats> {
    return this.guard("getStats", () => ({
      totalOpinions: this.count("SELECT COUNT(*) AS count FROM opinions"),
      discovered: this.count("SELECT COUNT(*) AS count FROM opinions WHERE downloadState = 'discovered'"),
      downloaded: this.count("SELECT COUNT(*) AS count FROM opinions WHERE downloadState = 'downloaded'"),
      downloadFailed: this.count("SELECT COUNT(*) AS count FROM opinions WHERE downloadState = 'download_failed'"),
      analyzed: this.count("SELECT COUNT(*) AS count FROM analyses"),
      interesting: this.count("SELECT COUNT(*) AS count FROM analyses WHERE interesting = 1"),
      pendingAnalysis: this.count(`
        SELECT COUNT(*) AS count FROM opinions o
        LEFT JOIN analyses a ON a.opinionId = o.id
        WHERE o.downloadState = 'downloaded' AND a.opinionId IS NULL
      `),
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(operation, error);
    }
  }

  private count(sql: string): number {
    const row = this.db.prepare<[], { count: number }>(sql).get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS opinions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sourceId TEXT NOT NULL,
        caseNumber TEXT NOT NULL,
        opinionType TEXT NOT NULL,
        publicationDate TEXT NOT NULL,
        listingUrl TEXT NOT NULL,
        directArtifactUrl TEXT NULL,
        caseUrl TEXT NULL,
        description TEXT NULL,
        localArtifactPath TEXT NULL,
        contentHash TEXT NULL,
        downloadState TEXT NOT NULL DEFAULT 'discovered',
        downloadAttempts INTEGER NOT NULL DEFAULT 0,
        lastError TEXT NULL,
        discoveredAt TEXT NOT NULL,
        downloadedAt TEXT NULL,
        updatedAt TEXT NOT NULL,
        UNIQUE (sourceId, caseNumber, opinionType)
      );

      CREATE TABLE IF NOT EXISTS analyses (
        opinionId INTEGER PRIMARY KEY REFERENCES opinions (id),
        engineModel TEXT NOT NULL,
        rawResultText TEXT NOT NULL,
        interestingIssueCount INTEGER NOT NULL DEFAULT 0,
        interesting INTEGER NOT NULL DEFAULT 0,
        analyzedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS representatives (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sourceId TEXT NOT NULL,
        caseNumber TEXT NOT NULL,
        partyName TEXT NOT NULL,
        partyType TEXT NOT NULL,
        representativeNames TEXT NOT NULL,
        fetchedAt TEXT NOT NULL,
        UNIQUE (sourceId, caseNumber, partyName)
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        mode TEXT NOT NULL,
        targetDate TEXT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        sourcesChecked INTEGER NOT NULL DEFAULT 0,
        sourcesFailed INTEGER NOT NULL DEFAULT 0,
        opinionsDiscovered INTEGER NOT NULL DEFAULT 0,
        opinionsDownloaded INTEGER NOT NULL DEFAULT 0,
        opinionsFailed INTEGER NOT NULL DEFAULT 0,
        analysesCompleted INTEGER NOT NULL DEFAULT 0,
        analysesFailed INTEGER NOT NULL DEFAULT 0,
        outcome TEXT NOT NULL,
        errorMessage TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_opinions_state ON opinions(downloadState);
      CREATE INDEX IF NOT EXISTS idx_opinions_discovered_at ON opinions(discoveredAt);
      CREATE INDEX IF NOT EXISTS idx_opinions_publication_date ON opinions(publicationDate);
    `);

    this.ensureColumn("opinions", "caseUrl", "TEXT NULL");
    this.ensureColumn("opinions", "description", "TEXT NULL");
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`).all();
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
