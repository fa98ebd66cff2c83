import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { sleep as defaultSleep, type SleepFn } from "../core/concurrency";
import { DownloadExhaustedError, errorMessage, OperationCancelledError, TransientNetworkError } from "../core/errors";
import { type FetchLike, type HttpResponseLike, timeoutSignal } from "../core/fetch";
import { runWithRetry } from "../core/retry";
import type { Logger, MetricsRegistry } from "../observability";
import { type ArtifactKind, assertSignature } from "./signatures";

export interface DownloadManagerDependencies {
  config: Pick<AppConfig, "userAgent" | "requestTimeoutMs" | "maxRetries" | "retryBaseDelayMs">;
  fetchFn: FetchLike;
  logger: Logger;
  metrics?: MetricsRegistry;
  sleep?: SleepFn;
}

export interface FetchedArtifact {
  bytes: Buffer;
  path: string;
  sha256: string;
  size: number;
  contentType?: string;
  resolvedUrl?: string;
  attempts: number;
}

interface TransferredBody {
  bytes: Buffer;
  contentType?: string;
  resolvedUrl?: string;
}

function acceptHeader(kind: ArtifactKind): string {
  return kind === "pdf" ? "application/pdf,*/*" : "*/*";
}

async function writeAtomically(destinationPath: string, bytes: Buffer): Promise<void> {
  await fs.promises.mkdir(path.dirname(destinationPath), { recursive: true });
  const tempPath = `${destinationPath}.part`;
  try {
    await fs.promises.writeFile(tempPath, bytes);
    await fs.promises.rename(tempPath, destinationPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Fetches remote artifacts with bounded retries and stores them on disk. Knows nothing about
 * the ledger: callers decide what a success or an exhausted download means for their records.
 */
export class DownloadManager {
  private readonly deps: DownloadManagerDependencies;

  constructor(deps: DownloadManagerDependencies) {
    this.deps = deps;
  }

  async fetch(url: string, expectedKind: ArtifactKind, destinationPath: string, signal?: AbortSignal): Promise<FetchedArtifact> {
    const { config, logger, metrics } = this.deps;
    const stopTimer = metrics?.startTimer("download_ms");

    const result = await runWithRetry((attempt) => this.transfer(url, expectedKind, attempt, signal), {
      policy: { maxAttempts: config.maxRetries, baseDelayMs: config.retryBaseDelayMs },
      signal,
      sleep: this.deps.sleep ?? defaultSleep,
      onAttemptFailed: (attempt, error, nextDelayMs) => {
        logger.warn("download_attempt_failed", {
          url,
          attempt,
          maxAttempts: config.maxRetries,
          error: errorMessage(error),
          retryInMs: nextDelayMs,
        });
      },
    });
    const durationMs = stopTimer?.();

    if (result.kind === "exhausted") {
      if (signal?.aborted) {
        throw new OperationCancelledError(`download of ${url} cancelled`);
      }
      throw new DownloadExhaustedError(url, result.attempts, result.lastError);
    }

    const { bytes, contentType, resolvedUrl } = result.value;
    await writeAtomically(destinationPath, bytes);
    const sha256 = crypto.createHash("sha256").update(bytes).digest("hex");

    logger.debug("download_stored", { url, path: destinationPath, bytes: bytes.length, attempt: result.attempt, durationMs });
    return {
      bytes,
      path: destinationPath,
      sha256,
      size: bytes.length,
      contentType,
      resolvedUrl,
      attempts: result.attempt,
    };
  }

  private async transfer(url: string, kind: ArtifactKind, attempt: number, signal?: AbortSignal): Promise<TransferredBody> {
    const { config, fetchFn, logger } = this.deps;
    logger.debug("download_attempt", { url, attempt });

    const request = timeoutSignal(config.requestTimeoutMs, signal);
    try {
      let response: HttpResponseLike;
      let bytes: Buffer;
      try {
        response = await fetchFn(url, {
          method: "GET",
          headers: {
            "user-agent": config.userAgent,
            accept: acceptHeader(kind),
          },
          signal: request.signal,
        });
        if (!response.ok) {
          throw new TransientNetworkError(`HTTP ${response.status} while downloading ${url}`, { statusCode: response.status });
        }
        bytes = Buffer.from(await response.arrayBuffer());
      } catch (error) {
        if (error instanceof TransientNetworkError) {
          throw error;
        }
        throw new TransientNetworkError(`download of ${url} failed: ${errorMessage(error)}`, { cause: error });
      }

      assertSignature(kind, bytes, url);
      return {
        bytes,
        contentType: response.headers.get("content-type") ?? undefined,
        resolvedUrl: response.url || undefined,
      };
    } finally {
      request.dispose();
    }
  }
}
