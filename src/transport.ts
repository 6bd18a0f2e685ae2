import { buildCollectionPayload, buildDataItemPayload } from "./assemble.js";
import type { PropertyCatalog } from "./catalog.js";
import { logger } from "./logger.js";
import { cell, toRow } from "./row.js";
import { validatePayloadMetas } from "./validate.js";
import type { MetadataEntry, ResourceKind, Row } from "./types.js";

/**
 * Module: Transport Seam
 * Purpose: Hand assembled metadata to an injected upload transport and collect
 * per-row outcomes. HTTP, retries and file uploads live behind `Transport`.
 */

export type ResourceDescriptor =
  | { kind: "data"; status: string; files: string[] }
  | { kind: "collection"; status: string; datas: string[] };

export interface TransportError {
  message: string;
  retryable: boolean;
  statusCode?: number;
}

export type SubmitResult = { ok: true; id: string } | { ok: false; error: TransportError };

export interface Transport {
  submit(metas: MetadataEntry[], resource: ResourceDescriptor): Promise<SubmitResult>;
}

export interface RowOutcome {
  rowIndex: number;
  title: string;
  result: SubmitResult;
}

export interface SubmitOptions {
  catalog: PropertyCatalog;
  resourceKind?: ResourceKind;
  status?: string;
}

const describe = (row: Row, options: SubmitOptions): { metas: MetadataEntry[]; resource: ResourceDescriptor } => {
  if ((options.resourceKind ?? "data") === "collection") {
    const { metas, status, datas } = buildCollectionPayload(row, options.catalog, { status: options.status });
    return { metas, resource: { kind: "collection", status, datas } };
  }
  const { metas, status, files } = buildDataItemPayload(row, options.catalog, { status: options.status });
  return { metas, resource: { kind: "data", status, files } };
};

const failure = (message: string, retryable: boolean): SubmitResult => ({ ok: false, error: { message, retryable } });

/**
 * Submit rows one after another. A row that is not a mapping of strings throws
 * `RowShapeError` with its index. Rows whose assembled metadata fails the
 * payload check are not sent. A transport that rejects instead of returning a
 * failure is recorded as a retryable failure for that row.
 */
export async function submitRows(rows: readonly Row[], transport: Transport, options: SubmitOptions): Promise<RowOutcome[]> {
  const log = logger.transport.child({ resourceKind: options.resourceKind ?? "data" });
  const outcomes: RowOutcome[] = [];
  for (let i = 0; i < rows.length; i++) {
    const row = toRow(rows[i], i);
    const title = cell(row, "title");
    const { metas, resource } = describe(row, options);
    const problems = validatePayloadMetas(metas, options.catalog);
    if (problems.length) {
      log.warn("Payload rejected before submission", { rowIndex: i, problems });
      outcomes.push({ rowIndex: i, title, result: failure(problems.join("; "), false) });
      continue;
    }
    const started = Date.now();
    let result: SubmitResult;
    try {
      result = await transport.submit(metas, resource);
    } catch (error) {
      log.error("Transport threw", { rowIndex: i, error });
      result = failure(error instanceof Error ? error.message : String(error), true);
    }
    if (result.ok) {
      log.timed("Resource created", started, { rowIndex: i, id: result.id });
    } else {
      log.warn("Submission failed", { rowIndex: i, retryable: result.error.retryable, message: result.error.message });
    }
    outcomes.push({ rowIndex: i, title, result });
  }
  return outcomes;
}
