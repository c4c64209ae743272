import type { AppConfig } from "../config";
import { BLOB_PATHS, CONTAINERS } from "../models/tables";
import type { ObjectStore } from "../storage/objectStore";
import { TransportError, safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export interface RawFetcherOptions {
  sourceUrl: string;
  byteBudget: number;
  store: ObjectStore;
  fetchImpl?: typeof fetch;
}

export interface FetchSummary {
  bytes: number;
  truncated: boolean;
}

const NEWLINE = 0x0a;

/**
 * Cuts a truncated sample back to its last complete line. Leaves the buffer
 * alone when no newline falls inside it.
 */
export const trimPartialLine = (data: Buffer): Buffer => {
  const lastNewline = data.lastIndexOf(NEWLINE);
  return lastNewline === -1 ? data : data.subarray(0, lastNewline + 1);
};

/**
 * Reads at most `byteBudget` bytes from the response body. The download is a
 * sample: the reader is cancelled as soon as the budget is filled.
 */
export const readWithBudget = async (
  body: ReadableStream<Uint8Array> | null,
  byteBudget: number,
): Promise<{ data: Buffer; truncated: boolean }> => {
  if (!body) return { data: Buffer.alloc(0), truncated: false };

  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let received = 0;
  let truncated = false;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    const remaining = byteBudget - received;
    if (value.byteLength >= remaining) {
      chunks.push(Buffer.from(value.subarray(0, remaining)));
      received += remaining;
      truncated = value.byteLength > remaining;
      if (!truncated) {
        const next = await reader.read();
        truncated = !next.done;
      }
      if (truncated) {
        await reader.cancel();
      }
      break;
    }
    chunks.push(Buffer.from(value));
    received += value.byteLength;
  }

  return { data: Buffer.concat(chunks, received), truncated };
};

export class RawFetcher {
  private readonly sourceUrl: string;
  private readonly byteBudget: number;
  private readonly store: ObjectStore;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RawFetcherOptions) {
    this.sourceUrl = options.sourceUrl;
    this.byteBudget = options.byteBudget;
    this.store = options.store;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async download(): Promise<{ data: Buffer; truncated: boolean }> {
    const fetchImpl = this.fetchImpl;
    logger.info("Downloading ridership sample", { sourceUrl: this.sourceUrl, byteBudget: this.byteBudget });
    let response: Response;
    try {
      response = await fetchImpl(this.sourceUrl);
    } catch (error) {
      throw new TransportError(`Ridership source request failed: ${safeErrorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(
        `Ridership source returned ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    let sample: { data: Buffer; truncated: boolean };
    try {
      sample = await readWithBudget(response.body, this.byteBudget);
    } catch (error) {
      throw new TransportError(`Ridership download interrupted: ${safeErrorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!sample.truncated) return sample;
    const trimmed = trimPartialLine(sample.data);
    logger.info("Byte budget reached; keeping a sample of the source", {
      received: sample.data.byteLength,
      kept: trimmed.byteLength,
    });
    return { data: trimmed, truncated: true };
  }

  async fetch(): Promise<Buffer> {
    const { data } = await this.download();
    return data;
  }

  /** Fetches and replaces the bronze snapshot. Nothing is written when the fetch fails. */
  async fetchToBronze(): Promise<FetchSummary> {
    const { data, truncated } = await this.download();
    logger.info("Uploading bronze snapshot", {
      object: `${CONTAINERS.bronze}/${BLOB_PATHS.raw}`,
      bytes: data.byteLength,
    });
    await this.store.put(CONTAINERS.bronze, BLOB_PATHS.raw, data);
    return { bytes: data.byteLength, truncated };
  }
}

export const createRawFetcher = (config: AppConfig, store: ObjectStore, fetchImpl?: typeof fetch) => {
  const options: RawFetcherOptions = {
    sourceUrl: config.sourceUrl,
    byteBudget: config.fetchByteBudget,
    store,
  };
  if (fetchImpl) {
    options.fetchImpl = fetchImpl;
  }
  return new RawFetcher(options);
};
