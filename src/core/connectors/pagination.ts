import type { Logger } from "../../lib/logger.js";
import { silentLogger } from "../../lib/logger.js";
import { ConfigurationError } from "./errors.js";
import { err, ok, type ConnectorResult } from "./types.js";

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_RECORDS = 10_000;

export interface PageCursor {
  offset: number;
  pageSize: number;
}

export type PageFetcher<T> = (cursor: PageCursor) => Promise<ConnectorResult<T[]>>;

export interface CollectPagesOptions {
  label: string;
  pageSize?: number | undefined;
  maxRecords?: number | undefined;
  logger?: Logger | undefined;
}

export interface PagingLimits {
  pageSize: number;
  maxRecords: number;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Throws `ConfigurationError` unless both limits are positive integers. */
export function resolvePagingLimits(
  system: string,
  options: { pageSize?: number | undefined; maxRecords?: number | undefined }
): PagingLimits {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS;
  if (!isPositiveInteger(pageSize)) {
    throw new ConfigurationError(system, `page size must be a positive integer: ${pageSize}`);
  }
  if (!isPositiveInteger(maxRecords)) {
    throw new ConfigurationError(system, `record ceiling must be a positive integer: ${maxRecords}`);
  }
  return { pageSize, maxRecords };
}

/**
 * Walks pages sequentially until one comes back shorter than the page size
 * or the accumulated count reaches `maxRecords`. A failed page ends the walk
 * and its error is returned as is; earlier pages are discarded.
 */
export async function collectAllPages<T>(fetchPage: PageFetcher<T>, options: CollectPagesOptions): Promise<ConnectorResult<T[]>> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS;
  const logger = options.logger ?? silentLogger;
  if (!isPositiveInteger(pageSize) || !isPositiveInteger(maxRecords)) {
    return err({
      kind: "invalid_input",
      code: "invalid_paging",
      message: `Invalid paging limits: pageSize=${pageSize}, maxRecords=${maxRecords}.`
    });
  }
  const records: T[] = [];
  let offset = 0;

  while (true) {
    logger.debug({ label: options.label, offset, pageSize }, "fetching page");
    const page = await fetchPage({ offset, pageSize });
    if (!page.ok) {
      return page;
    }
    records.push(...page.value);

    if (page.value.length < pageSize) {
      break;
    }
    if (records.length >= maxRecords) {
      logger.warn({ label: options.label, maxRecords }, "pagination ceiling reached; stopping early");
      break;
    }
    offset += pageSize;
  }

  return ok(records.length > maxRecords ? records.slice(0, maxRecords) : records);
}
