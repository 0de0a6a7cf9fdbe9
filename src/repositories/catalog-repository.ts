import { Pool, type QueryResultRow } from "pg";
import type { Logger } from "pino";
import type { Env } from "../config";
import { getLogger } from "../lib/logger";
import {
  editPermissionSchema,
  seriesSchema,
  unitSchema,
  type EditPermission,
  type Series,
  type Unit,
} from "../schemas/catalog";

export type PaginationParams = {
  limit?: number;
  cursor?: string | null;
};

export type PaginatedResult<T> = {
  items: T[];
  nextCursor: string | null;
};

const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

function normalizeLimit(limit?: number) {
  if (!limit) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.max(1, Math.min(limit, MAX_PAGE_SIZE));
}

function compareSeries(a: Series, b: Series) {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function compareUnits(a: Unit, b: Unit) {
  if (a.unitNumber !== b.unitNumber) {
    return a.unitNumber - b.unitNumber;
  }
  return a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;
}

/**
 * Persistence capability the catalog core works against. Implementations
 * store whole records; callers serialize read-modify-write sequences.
 */
export interface CatalogRepository {
  getSeries(id: string): Promise<Series | null>;
  listSeries(params: PaginationParams): Promise<PaginatedResult<Series>>;
  createSeries(series: Series): Promise<void>;
  updateSeries(series: Series): Promise<void>;
  /** Removes the series, its units and every grant recorded against them. */
  deleteSeries(id: string): Promise<void>;
  getUnit(id: string): Promise<Unit | null>;
  getUnitsOfSeries(seriesId: string): Promise<Unit[]>;
  createUnit(unit: Unit): Promise<void>;
  updateUnit(unit: Unit): Promise<void>;
  deleteUnit(id: string): Promise<void>;
  recordPermissionGrant(permission: EditPermission): Promise<void>;
  removePermissionGrant(targetUrn: string, userUrn: string): Promise<void>;
  listPermissionGrants(targetUrn: string): Promise<EditPermission[]>;
  /** Prepares storage; rejects when the backing store is unreachable. */
  init(): Promise<void>;
  close(): Promise<void>;
}

export function createCatalogRepository(
  config: Env,
  logger?: Logger
): CatalogRepository {
  const scopedLogger = logger ?? getLogger();

  if (config.CATALOG_REPOSITORY_BACKEND === "postgres") {
    if (!config.POSTGRES_DSN) {
      throw new Error("POSTGRES_DSN is required for postgres backend");
    }
    return new PostgresCatalogRepository(config.POSTGRES_DSN, scopedLogger);
  }

  return new InMemoryCatalogRepository(scopedLogger);
}

function permissionKey(targetUrn: string, userUrn: string) {
  return `${targetUrn}|${userUrn}`;
}

export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly series = new Map<string, Series>();
  private readonly units = new Map<string, Unit>();
  private readonly permissions = new Map<string, EditPermission>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? getLogger()).child({ store: "memory" });
  }

  async getSeries(id: string): Promise<Series | null> {
    return this.series.get(id) ?? null;
  }

  async listSeries(
    params: PaginationParams
  ): Promise<PaginatedResult<Series>> {
    const limit = normalizeLimit(params.limit);
    const ordered = Array.from(this.series.values()).sort(compareSeries);
    const start = params.cursor
      ? ordered.findIndex((entry) => entry.id === params.cursor) + 1
      : 0;
    const page = ordered.slice(start, start + limit);
    const hasMore = start + limit < ordered.length;
    return {
      items: page,
      nextCursor: hasMore && page.length > 0 ? page[page.length - 1].id : null,
    };
  }

  async createSeries(series: Series): Promise<void> {
    this.series.set(series.id, series);
    this.logger.debug({ seriesId: series.id }, "Created series");
  }

  /** Updates never create; a missing id is left missing. */
  async updateSeries(series: Series): Promise<void> {
    if (!this.series.has(series.id)) {
      return;
    }
    this.series.set(series.id, series);
    this.logger.debug({ seriesId: series.id }, "Persisted series");
  }

  async deleteSeries(id: string): Promise<void> {
    for (const unit of Array.from(this.units.values())) {
      if (unit.seriesId === id) {
        await this.deleteUnit(unit.id);
      }
    }
    this.dropPermissionsFor(id);
    this.series.delete(id);
  }

  async getUnit(id: string): Promise<Unit | null> {
    return this.units.get(id) ?? null;
  }

  async getUnitsOfSeries(seriesId: string): Promise<Unit[]> {
    return Array.from(this.units.values())
      .filter((unit) => unit.seriesId === seriesId)
      .sort(compareUnits);
  }

  async createUnit(unit: Unit): Promise<void> {
    this.units.set(unit.id, unit);
    this.logger.debug({ unitId: unit.id, seriesId: unit.seriesId }, "Created unit");
  }

  async updateUnit(unit: Unit): Promise<void> {
    if (!this.units.has(unit.id)) {
      return;
    }
    this.units.set(unit.id, unit);
    this.logger.debug({ unitId: unit.id, seriesId: unit.seriesId }, "Persisted unit");
  }

  async deleteUnit(id: string): Promise<void> {
    this.dropPermissionsFor(id);
    this.units.delete(id);
  }

  async recordPermissionGrant(permission: EditPermission): Promise<void> {
    this.permissions.set(
      permissionKey(permission.targetUrn, permission.userUrn),
      permission
    );
  }

  async removePermissionGrant(targetUrn: string, userUrn: string): Promise<void> {
    this.permissions.delete(permissionKey(targetUrn, userUrn));
  }

  async listPermissionGrants(targetUrn: string): Promise<EditPermission[]> {
    return Array.from(this.permissions.values())
      .filter((permission) => permission.targetUrn === targetUrn)
      .sort((a, b) => (a.grantedAt < b.grantedAt ? 1 : a.grantedAt > b.grantedAt ? -1 : 0));
  }

  async init(): Promise<void> {
    this.logger.debug("In-memory catalog store ready");
  }

  async close(): Promise<void> {
    this.series.clear();
    this.units.clear();
    this.permissions.clear();
  }

  private dropPermissionsFor(targetUrn: string) {
    for (const [key, permission] of this.permissions) {
      if (permission.targetUrn === targetUrn) {
        this.permissions.delete(key);
      }
    }
  }
}

class PostgresCatalogRepository implements CatalogRepository {
  private readonly pool: Pool;
  private readonly logger: Logger;
  private schemaReady: Promise<void> | null = null;

  constructor(connectionString: string, logger: Logger) {
    this.pool = new Pool({ connectionString });
    this.logger = logger.child({ store: "postgres" });
  }

  /** Creates the tables once; a failed attempt is retried on the next call. */
  async init(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    await this.schemaReady;
  }

  private async createSchema() {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS catalog_series (
        id TEXT PRIMARY KEY,
        created_at TIMESTAMPTZ NOT NULL,
        document JSONB NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS catalog_units (
        id TEXT PRIMARY KEY,
        series_id TEXT NOT NULL REFERENCES catalog_series(id) ON DELETE CASCADE,
        unit_number DOUBLE PRECISION NOT NULL,
        created_at TIMESTAMPTZ NOT NULL,
        document JSONB NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS catalog_edit_permissions (
        target_urn TEXT NOT NULL,
        user_urn TEXT NOT NULL,
        granted_by TEXT NOT NULL,
        granted_at TIMESTAMPTZ NOT NULL,
        PRIMARY KEY (target_urn, user_urn)
      )
    `);
    this.logger.info("Catalog tables ready");
  }

  private async ensureReady() {
    await this.init();
  }

  async getSeries(id: string): Promise<Series | null> {
    await this.ensureReady();
    const result = await this.pool.query(
      "SELECT document FROM catalog_series WHERE id = $1",
      [id]
    );
    if (result.rowCount === 0) {
      return null;
    }
    return this.seriesFromRow(result.rows[0]);
  }

  async listSeries(
    params: PaginationParams
  ): Promise<PaginatedResult<Series>> {
    await this.ensureReady();
    const limit = normalizeLimit(params.limit);
    const result = params.cursor
      ? await this.pool.query(
        `SELECT document FROM catalog_series
         WHERE (created_at, id) > (SELECT created_at, id FROM catalog_series WHERE id = $1)
         ORDER BY created_at ASC, id ASC
         LIMIT $2`,
        [params.cursor, limit + 1]
      )
      : await this.pool.query(
        `SELECT document FROM catalog_series
         ORDER BY created_at ASC, id ASC
         LIMIT $1`,
        [limit + 1]
      );
    const rows = result.rows.map((row) => this.seriesFromRow(row));
    const hasMore = rows.length > limit;
    const items = hasMore ? rows.slice(0, limit) : rows;
    return {
      items,
      nextCursor: hasMore ? items[items.length - 1].id : null,
    };
  }

  async createSeries(series: Series): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      "INSERT INTO catalog_series (id, created_at, document) VALUES ($1, $2, $3)",
      [series.id, series.createdAt, JSON.stringify(series)]
    );
    this.logger.debug({ seriesId: series.id }, "Created series");
  }

  async updateSeries(series: Series): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      "UPDATE catalog_series SET document = $2 WHERE id = $1",
      [series.id, JSON.stringify(series)]
    );
    this.logger.debug({ seriesId: series.id }, "Persisted series");
  }

  async deleteSeries(id: string): Promise<void> {
    await this.ensureReady();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        `DELETE FROM catalog_edit_permissions
         WHERE target_urn = $1
            OR target_urn IN (SELECT id FROM catalog_units WHERE series_id = $1)`,
        [id]
      );
      await client.query("DELETE FROM catalog_series WHERE id = $1", [id]);
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getUnit(id: string): Promise<Unit | null> {
    await this.ensureReady();
    const result = await this.pool.query(
      "SELECT document FROM catalog_units WHERE id = $1",
      [id]
    );
    if (result.rowCount === 0) {
      return null;
    }
    return this.unitFromRow(result.rows[0]);
  }

  async getUnitsOfSeries(seriesId: string): Promise<Unit[]> {
    await this.ensureReady();
    const result = await this.pool.query(
      `SELECT document FROM catalog_units
       WHERE series_id = $1
       ORDER BY unit_number ASC, created_at ASC`,
      [seriesId]
    );
    return result.rows.map((row) => this.unitFromRow(row));
  }

  async createUnit(unit: Unit): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      `INSERT INTO catalog_units (id, series_id, unit_number, created_at, document)
       VALUES ($1, $2, $3, $4, $5)`,
      [unit.id, unit.seriesId, unit.unitNumber, unit.createdAt, JSON.stringify(unit)]
    );
    this.logger.debug({ unitId: unit.id, seriesId: unit.seriesId }, "Created unit");
  }

  async updateUnit(unit: Unit): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      "UPDATE catalog_units SET unit_number = $2, document = $3 WHERE id = $1",
      [unit.id, unit.unitNumber, JSON.stringify(unit)]
    );
    this.logger.debug({ unitId: unit.id, seriesId: unit.seriesId }, "Persisted unit");
  }

  async deleteUnit(id: string): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      "DELETE FROM catalog_edit_permissions WHERE target_urn = $1",
      [id]
    );
    await this.pool.query("DELETE FROM catalog_units WHERE id = $1", [id]);
  }

  async recordPermissionGrant(permission: EditPermission): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      `INSERT INTO catalog_edit_permissions (target_urn, user_urn, granted_by, granted_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (target_urn, user_urn) DO UPDATE SET
         granted_by = EXCLUDED.granted_by,
         granted_at = EXCLUDED.granted_at`,
      [
        permission.targetUrn,
        permission.userUrn,
        permission.grantedBy,
        permission.grantedAt,
      ]
    );
  }

  async removePermissionGrant(targetUrn: string, userUrn: string): Promise<void> {
    await this.ensureReady();
    await this.pool.query(
      "DELETE FROM catalog_edit_permissions WHERE target_urn = $1 AND user_urn = $2",
      [targetUrn, userUrn]
    );
  }

  async listPermissionGrants(targetUrn: string): Promise<EditPermission[]> {
    await this.ensureReady();
    const result = await this.pool.query(
      `SELECT target_urn, user_urn, granted_by, granted_at
       FROM catalog_edit_permissions
       WHERE target_urn = $1
       ORDER BY granted_at DESC`,
      [targetUrn]
    );
    return result.rows.map((row) =>
      editPermissionSchema.parse({
        targetUrn: row.target_urn,
        userUrn: row.user_urn,
        grantedBy: row.granted_by,
        grantedAt:
          row.granted_at instanceof Date
            ? row.granted_at.toISOString()
            : row.granted_at,
      })
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private seriesFromRow(row: QueryResultRow): Series {
    return seriesSchema.parse(row.document);
  }

  private unitFromRow(row: QueryResultRow): Unit {
    return unitSchema.parse(row.document);
  }
}
