import { getPostgresClient } from "../../clients/postgres.js";
import { logError, logInfo } from "../../observability/logger.js";
import { serializeError } from "../../errors.js";
import type { ReviewEntry, ReviewSink } from "./types.js";

export interface ReviewRecord {
  id: number;
  requestId: string;
  trigger: string;
  status: string;
  scopeDomain: string | null;
  createdAt: Date;
}

export interface ReviewRow {
  id: number;
  request_id: string;
  trigger: string;
  status: string;
  scope_domain: string | null;
  created_at: Date;
}

export type ReviewQuery = (sql: string, values: unknown[]) => Promise<{ rows: ReviewRow[] }>;

const defaultQuery: ReviewQuery = async (sql, values) => {
  const { pool } = await getPostgresClient();
  return pool.query<ReviewRow>(sql, values);
};

const toRecord = (row: ReviewRow): ReviewRecord => ({
  id: row.id,
  requestId: row.request_id,
  trigger: row.trigger,
  status: row.status,
  scopeDomain: row.scope_domain,
  createdAt: row.created_at
});

export class PostgresReviewRepository implements ReviewSink {
  constructor(private readonly query: ReviewQuery = defaultQuery) {}

  async submit(entry: ReviewEntry): Promise<void> {
    const record = await this.insert(entry);
    logInfo("review.entry.queued", { requestId: entry.requestId }, { review_id: record.id, trigger: entry.trigger });
  }

  async insert(entry: ReviewEntry): Promise<ReviewRecord> {
    const result = await this.query(
      `
        INSERT INTO review_queue (request_id, trigger, status, scope_domain, cleaned_query, payload)
        VALUES ($1, $2, $3, $4, $5, $6::jsonb)
        RETURNING id, request_id, trigger, status, scope_domain, created_at
      `,
      [entry.requestId, entry.trigger, entry.status, entry.scopeDomain, entry.cleanedQuery, JSON.stringify(entry.payload)]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error("Review queue insert returned no row.");
    }
    return toRecord(row);
  }
}

/** Used when no database is configured; entries only reach the log. */
export const logOnlyReviewSink: ReviewSink = {
  async submit(entry) {
    logInfo("review.entry.logged", { requestId: entry.requestId }, {
      trigger: entry.trigger,
      status: entry.status,
      scope_domain: entry.scopeDomain
    });
  }
};

export const reportReviewSinkFailure = (entry: ReviewEntry, error: unknown): void => {
  logError("review.entry.failed", { requestId: entry.requestId }, { trigger: entry.trigger, ...serializeError(error) });
};
