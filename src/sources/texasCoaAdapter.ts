import type { AppConfig } from "../config";
import type { SleepFn } from "../core/concurrency";
import { toDocketDate } from "../core/dates";
import { errorMessage, OperationCancelledError, SourceUnavailableError, TransientNetworkError } from "../core/errors";
import { type FetchLike, type HttpResponseLike, timeoutSignal } from "../core/fetch";
import { runWithRetry } from "../core/retry";
import type { Logger, MetricsRegistry } from "../observability";
import type { CaseParty, OpinionRef } from "../types";
import { parseCaseParties } from "./caseParties";
import { courtNumber } from "./courts";
import { parseCriminalCauses } from "./docketParser";
import { assignOpinionTypes } from "./opinionType";
import type { CasePageTarget, CasePartiesSource, SourceAdapter } from "./types";

export interface TexasCoaAdapterDependencies {
  config: Pick<AppConfig, "baseUrl" | "userAgent" | "requestTimeoutMs" | "maxRetries" | "retryBaseDelayMs">;
  fetchFn: FetchLike;
  logger: Logger;
  metrics?: MetricsRegistry;
  sleep?: SleepFn;
}

export function buildDocketUrl(baseUrl: string, sourceId: string, date: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return `${base}Docket.aspx?coa=${sourceId}&FullDate=${toDocketDate(date)}`;
}

export function buildCaseUrl(baseUrl: string, sourceId: string, caseNumber: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return `${base}Case.aspx?cn=${encodeURIComponent(caseNumber)}&coa=${sourceId}`;
}

type PageKind = "listing" | "case_page";

/** Lists criminal opinions from the Texas intermediate appellate courts' daily docket pages. */
export class TexasCoaSourceAdapter implements SourceAdapter, CasePartiesSource {
  private readonly deps: TexasCoaAdapterDependencies;

  constructor(deps: TexasCoaAdapterDependencies) {
    this.deps = deps;
  }

  async list(sourceId: string, date: string, signal?: AbortSignal): Promise<OpinionRef[]> {
    if (courtNumber(sourceId) === undefined) {
      throw new SourceUnavailableError(sourceId, `unknown source '${sourceId}'`);
    }

    const listingUrl = buildDocketUrl(this.deps.config.baseUrl, sourceId, date);
    const html = await this.fetchPage("listing", sourceId, listingUrl, signal);
    const cases = parseCriminalCauses(html, listingUrl, sourceId);

    const refs: OpinionRef[] = [];
    for (const docketCase of cases) {
      const opinionTypes = assignOpinionTypes(
        docketCase.documents.map((document) => document.description),
        docketCase.disposition,
      );
      docketCase.documents.forEach((document, index) => {
        refs.push({
          sourceId,
          caseNumber: docketCase.caseNumber,
          opinionType: opinionTypes[index],
          publicationDate: date,
          listingUrl,
          documentUrl: document.url,
          caseUrl: docketCase.caseUrl,
          description: document.description || undefined,
        });
      });
    }

    this.deps.logger.debug("listing_parsed", { sourceId, url: listingUrl, cases: cases.length, opinions: refs.length });
    return refs;
  }

  async fetchParties(target: CasePageTarget, signal?: AbortSignal): Promise<CaseParty[]> {
    const url = target.caseUrl ?? buildCaseUrl(this.deps.config.baseUrl, target.sourceId, target.caseNumber);
    const html = await this.fetchPage("case_page", target.sourceId, url, signal);
    const parties = parseCaseParties(html);
    this.deps.logger.debug("case_page_parsed", {
      sourceId: target.sourceId,
      caseNumber: target.caseNumber,
      url,
      parties: parties.length,
    });
    return parties;
  }

  private async fetchPage(kind: PageKind, sourceId: string, url: string, signal?: AbortSignal): Promise<string> {
    const { config, fetchFn, logger, metrics } = this.deps;
    const stopTimer = kind === "listing" ? metrics?.startTimer("listing_fetch_ms") : undefined;

    const result = await runWithRetry(
      async () => {
        const request = timeoutSignal(config.requestTimeoutMs, signal);
        try {
          let response: HttpResponseLike;
          try {
            response = await fetchFn(url, {
              method: "GET",
              headers: {
                "user-agent": config.userAgent,
                accept: "text/html,application/xhtml+xml",
              },
              signal: request.signal,
            });
          } catch (error) {
            throw new TransientNetworkError(`request to ${url} failed: ${errorMessage(error)}`, { cause: error });
          }

          if (!response.ok) {
            throw new TransientNetworkError(`HTTP ${response.status} while fetching ${url}`, { statusCode: response.status });
          }
          return await response.text();
        } finally {
          request.dispose();
        }
      },
      {
        policy: { maxAttempts: config.maxRetries, baseDelayMs: config.retryBaseDelayMs },
        signal,
        sleep: this.deps.sleep,
        onAttemptFailed: (attempt, error, nextDelayMs) => {
          logger.warn(`${kind}_attempt_failed`, {
            sourceId,
            url,
            attempt,
            error: errorMessage(error),
            retryInMs: nextDelayMs,
          });
        },
      },
    );
    stopTimer?.();

    if (result.kind === "exhausted") {
      if (signal?.aborted) {
        throw new OperationCancelledError();
      }
      throw new SourceUnavailableError(
        sourceId,
        `${kind === "listing" ? "listing" : "case page"} ${url} unavailable after ${result.attempts} attempts: ${errorMessage(result.lastError)}`,
        result.lastError,
      );
    }
    return result.value;
  }
}
