import pg from "pg";
import { z } from "zod";
import { describeError, PersistenceError } from "../extraction/errors.js";
import { logger } from "../extraction/logger.js";
import { withRetry } from "../extraction/retry.js";
import type { BidDocument, OpportunityRepository, OpportunityRow } from "../extraction/types.js";

/** The slice of pg.Pool this repository uses. */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export type PoolFactory = () => SqlPool;

export function createPgPool(connectionString: string): SqlPool {
  const pool = new pg.Pool({
    connectionString,
    max: 4,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
  pool.on("error", (err: Error) => {
    logger.error("Unexpected PostgreSQL pool error", { error: err.message });
  });
  return pool;
}

const projectIdRow = z.object({ project_id: z.coerce.number().int() });

const bidDocumentRow = z.object({
  id: z.coerce.number().int(),
  project_id: z.coerce.number().int(),
  document_type: z.string().nullable().default(null),
  display_name: z.string().nullable().default(null),
  s3_path: z.string().nullable().default(null),
});

const OPPORTUNITY_COLUMNS = [
  ["project_id", "projectId"],
  ["job_code", "jobCode"],
  ["job_description", "jobDescription"],
  ["job_summary", "jobSummary"],
  ["job_size", "jobSize"],
  ["frequency", "frequency"],
  ["match_confidence", "matchConfidence"],
  ["contract_value_range", "contractValueRange"],
  ["submission_deadline", "submissionDeadline"],
  ["licensing_requirements", "licensingRequirements"],
  ["technical_complexity", "technicalComplexity"],
  ["project_location", "projectLocation"],
  ["contract_duration", "contractDuration"],
  ["insurance_requirements", "insuranceRequirements"],
  ["equipment_specifications", "equipmentSpecifications"],
  ["compliance_standards", "complianceStandards"],
  ["reporting_requirements", "reportingRequirements"],
  ["project_type", "projectType"],
] as const satisfies ReadonlyArray<readonly [string, keyof OpportunityRow]>;

export const INSERT_OPPORTUNITY_SQL = `INSERT INTO opportunities (${OPPORTUNITY_COLUMNS.map(([c]) => c).join(", ")})
VALUES (${OPPORTUNITY_COLUMNS.map((_, i) => `$${i + 1}`).join(", ")})`;

export function opportunityValues(row: OpportunityRow): unknown[] {
  return OPPORTUNITY_COLUMNS.map(([, field]) => row[field]);
}

/**
 * Opportunity persistence over a pooled connection. Each call pings the pool
 * first; on any fault the pool is replaced and the call retried once.
 */
export class PostgresOpportunityRepository implements OpportunityRepository {
  private pool: SqlPool | null = null;

  constructor(private readonly createPool: PoolFactory) {}

  static fromUrl(connectionString: string): PostgresOpportunityRepository {
    return new PostgresOpportunityRepository(() => createPgPool(connectionString));
  }

  private async reconnect(): Promise<void> {
    const old = this.pool;
    this.pool = null;
    if (old) {
      await old.end().catch((err: unknown) => {
        logger.warn("Closing stale pool failed", { error: describeError(err) });
      });
    }
  }

  private async run<T>(operation: string, fn: (pool: SqlPool) => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        async () => {
          const pool = (this.pool ??= this.createPool());
          await pool.query("SELECT 1");
          return fn(pool);
        },
        {
          attempts: 2,
          backoff: () => 0,
          onRetry: async (err) => {
            logger.warn("Database call failed; reconnecting", { operation, error: describeError(err) });
            await this.reconnect();
          },
        },
      );
    } catch (err) {
      throw new PersistenceError(`${operation} failed: ${describeError(err)}`, { operation }, { cause: err });
    }
  }

  async existingProjectKeys(): Promise<Set<number>> {
    const { rows } = await this.run("existingProjectKeys", (pool) =>
      pool.query("SELECT DISTINCT project_id FROM opportunities"),
    );
    return new Set(rows.map((row) => projectIdRow.parse(row).project_id));
  }

  async fetchBidDocuments(limit: number, offset: number): Promise<BidDocument[]> {
    const { rows } = await this.run("fetchBidDocuments", (pool) =>
      pool.query(
        `SELECT id, project_id, document_type, display_name, s3_path
         FROM bid_documents
         ORDER BY id
         LIMIT $1 OFFSET $2`,
        [limit, offset],
      ),
    );
    return rows.map((raw) => {
      const row = bidDocumentRow.parse(raw);
      return {
        id: row.id,
        projectId: row.project_id,
        documentType: row.document_type,
        displayName: row.display_name,
        s3Path: row.s3_path,
      };
    });
  }

  async insertOpportunity(row: OpportunityRow): Promise<boolean> {
    try {
      await this.run("insertOpportunity", (pool) =>
        pool.query(INSERT_OPPORTUNITY_SQL, opportunityValues(row)),
      );
      logger.debug("Inserted opportunity", { projectId: row.projectId, jobCode: row.jobCode });
      return true;
    } catch (err) {
      logger.error("Insert failed", {
        projectId: row.projectId,
        jobCode: row.jobCode,
        error: describeError(err),
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.reconnect();
  }
}
