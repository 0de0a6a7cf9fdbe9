import type { Logger } from "pino";
import { getLogger } from "../lib/logger";
import type {
  CatalogRepository,
  PaginatedResult,
  PaginationParams,
} from "../repositories/catalog-repository";
import type {
  CreateSeriesInput,
  CreateUnitInput,
  EditPermission,
  Series,
  Unit,
  UpdateSeriesInput,
  UpdateUnitInput,
} from "../schemas/catalog";
import { KeyedLock } from "../utils/keyed-lock";
import {
  createSeriesUrn,
  createUnitUrn,
  formatUrn,
  isValidUrn,
  MVN_NAMESPACE,
  tryParseUrn,
} from "../utils/urn";
import type { CatalogEvent, CatalogEventsPublisher } from "./catalog-events";
import { PermissionError, PermissionResolver } from "./permission-resolver";
import { TaxonomyAggregator } from "./taxonomy-aggregator";

export type CatalogErrorCode =
  | "NOT_FOUND"
  | "CONFLICT"
  | "FAILED_PRECONDITION"
  | "INVALID_ARGUMENT"
  | "FORBIDDEN";

export class CatalogServiceError extends Error {
  constructor(
    public readonly code: CatalogErrorCode,
    message: string
  ) {
    super(message);
    this.name = "CatalogServiceError";
  }
}

export type Actor = {
  userUrn: string;
  isAdmin: boolean;
};

export type GetUnitOptions = {
  /** Fill unset unit metadata from the series. */
  inherit?: boolean;
  language?: string;
};

export type CatalogServiceOptions = {
  repository: CatalogRepository;
  aggregator?: TaxonomyAggregator;
  permissions?: PermissionResolver;
  locks?: KeyedLock;
  eventsPublisher?: CatalogEventsPublisher;
  logger?: Logger;
  now?: () => Date;
};

function withoutTimestamp(series: Series) {
  const { updatedAt: _updatedAt, ...rest } = series;
  return JSON.stringify(rest);
}

function translatePermissionError(error: unknown): never {
  if (error instanceof PermissionError) {
    throw new CatalogServiceError(error.code, error.message);
  }
  throw error;
}

/**
 * Series and unit lifecycle. Every write to a series record, and every unit
 * write together with the recompute that follows it, runs under the series
 * URN lock; unit record writes additionally hold the unit URN lock.
 */
export class CatalogService {
  private readonly repo: CatalogRepository;
  private readonly aggregator: TaxonomyAggregator;
  private readonly locks: KeyedLock;
  private readonly permissions: PermissionResolver;
  private readonly events?: CatalogEventsPublisher;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CatalogServiceOptions) {
    this.repo = options.repository;
    this.logger = (options.logger ?? getLogger()).child({
      component: "catalog-service",
    });
    this.locks = options.locks ?? new KeyedLock("catalog");
    this.now = options.now ?? (() => new Date());
    this.aggregator =
      options.aggregator ?? new TaxonomyAggregator({ logger: this.logger });
    this.permissions =
      options.permissions ??
      new PermissionResolver({
        repository: this.repo,
        locks: this.locks,
        logger: this.logger,
        now: this.now,
      });
    this.events = options.eventsPublisher;
  }

  get permissionResolver() {
    return this.permissions;
  }

  private timestamp() {
    return this.now().toISOString();
  }

  private async emitCatalogEvent(event: {
    entity: CatalogEvent["entity"];
    entityId: string;
    operation: CatalogEvent["operation"];
    actor?: Actor;
    payload?: Record<string, unknown>;
  }) {
    if (!this.events) {
      return;
    }
    await this.events.publish({
      type: "catalog.updated",
      entity: event.entity,
      entityId: event.entityId,
      operation: event.operation,
      actor: event.actor?.userUrn,
      timestamp: this.timestamp(),
      payload: event.payload,
    });
  }

  private async requireSeries(seriesId: string): Promise<Series> {
    const series = await this.repo.getSeries(seriesId);
    if (!series) {
      throw new CatalogServiceError("NOT_FOUND", `Series ${seriesId} not found`);
    }
    return series;
  }

  private async requireUnit(seriesId: string, unitId: string): Promise<Unit> {
    const unit = await this.repo.getUnit(unitId);
    if (!unit || unit.seriesId !== seriesId) {
      throw new CatalogServiceError(
        "NOT_FOUND",
        `Unit ${unitId} not found in series ${seriesId}`
      );
    }
    return unit;
  }

  async canEdit(actor: Actor, targetUrn: string): Promise<boolean> {
    if (actor.isAdmin) {
      return true;
    }
    return this.permissions.isAuthorized(targetUrn, actor.userUrn);
  }

  private async assertCanEdit(actor: Actor, targetUrn: string) {
    if (!(await this.canEdit(actor, targetUrn))) {
      throw new CatalogServiceError(
        "FORBIDDEN",
        `You do not have permission to edit ${targetUrn}`
      );
    }
  }

  /**
   * Grants, revocations and grant listings belong to the target owner, the
   * parent series owner for a unit, and admins. Editors cannot delegate.
   * Returns the owner of the target.
   */
  private async assertCanManagePermissions(
    actor: Actor,
    targetUrn: string
  ): Promise<string> {
    const parsed = tryParseUrn(targetUrn);
    if (
      !parsed ||
      parsed.namespace !== MVN_NAMESPACE ||
      (parsed.type !== "series" && parsed.type !== "unit")
    ) {
      throw new CatalogServiceError(
        "INVALID_ARGUMENT",
        `Edit permissions apply to series and units, not '${targetUrn}'`
      );
    }
    const urn = formatUrn(parsed);

    const owners: string[] = [];
    if (parsed.type === "series") {
      owners.push((await this.requireSeries(urn)).createdBy);
    } else {
      const unit = await this.repo.getUnit(urn);
      if (!unit) {
        throw new CatalogServiceError("NOT_FOUND", `Unit ${urn} not found`);
      }
      owners.push(unit.createdBy);
      const series = await this.repo.getSeries(unit.seriesId);
      if (series) {
        owners.push(series.createdBy);
      }
    }

    if (!actor.isAdmin && !owners.includes(actor.userUrn)) {
      throw new CatalogServiceError(
        "FORBIDDEN",
        `Only the owner or an admin can manage permissions on ${urn}`
      );
    }
    return owners[0];
  }

  /** Must run under the series lock; persists only when the view changed. */
  private async recomputeLocked(series: Series): Promise<Series> {
    const units = await this.repo.getUnitsOfSeries(series.id);
    const aggregated = this.aggregator.recompute(series, units);
    if (withoutTimestamp(aggregated) === withoutTimestamp(series)) {
      return series;
    }
    const persisted = { ...aggregated, updatedAt: this.timestamp() };
    await this.repo.updateSeries(persisted);
    return persisted;
  }

  async createSeries(actor: Actor, input: CreateSeriesInput): Promise<Series> {
    if (!isValidUrn(actor.userUrn, "user")) {
      throw new CatalogServiceError(
        "INVALID_ARGUMENT",
        `Owner must be a user URN, got '${actor.userUrn}'`
      );
    }

    const now = this.timestamp();
    const series: Series = {
      id: createSeriesUrn(),
      federationRef: input.federationRef,
      title: input.title,
      description: input.description ?? "",
      poster: input.poster,
      mediaType: input.mediaType,
      readingDirection: input.readingDirection,
      externalLinks: input.externalLinks ?? {},
      tags: input.tags ?? [],
      contentWarnings: input.contentWarnings ?? [],
      authors: input.authors ?? [],
      scanlators: input.scanlators ?? [],
      groups: input.groups ?? [],
      altTitles: input.altTitles ?? [],
      status: input.status,
      year: input.year,
      originalLanguage: input.originalLanguage,
      createdBy: actor.userUrn,
      createdAt: now,
      updatedAt: now,
      localized: input.localized ?? {},
      allowedEditors: [],
    };

    await this.repo.createSeries(series);
    this.logger.info(
      { seriesId: series.id, owner: actor.userUrn },
      "Created series"
    );
    await this.emitCatalogEvent({
      entity: "series",
      entityId: series.id,
      operation: "create",
      actor,
    });
    return series;
  }

  async getSeries(seriesId: string): Promise<Series> {
    return this.requireSeries(seriesId);
  }

  async listSeries(params: PaginationParams): Promise<PaginatedResult<Series>> {
    return this.repo.listSeries(params);
  }

  async updateSeries(
    actor: Actor,
    seriesId: string,
    input: UpdateSeriesInput
  ): Promise<Series> {
    await this.assertCanEdit(actor, seriesId);

    const updated = await this.locks.runExclusive(seriesId, async () => {
      const series = await this.requireSeries(seriesId);
      const merged: Series = {
        ...series,
        ...input,
        updatedAt: this.timestamp(),
      };
      await this.repo.updateSeries(merged);
      return this.recomputeLocked(merged);
    });

    await this.emitCatalogEvent({
      entity: "series",
      entityId: seriesId,
      operation: "update",
      actor,
      payload: { fields: Object.keys(input) },
    });
    return updated;
  }

  async deleteSeries(actor: Actor, seriesId: string): Promise<void> {
    await this.assertCanEdit(actor, seriesId);
    await this.locks.runExclusive(seriesId, async () => {
      await this.requireSeries(seriesId);
      await this.repo.deleteSeries(seriesId);
    });
    this.logger.info({ seriesId, actor: actor.userUrn }, "Deleted series");
    await this.emitCatalogEvent({
      entity: "series",
      entityId: seriesId,
      operation: "delete",
      actor,
    });
  }

  async recomputeSeries(seriesId: string): Promise<Series> {
    return this.locks.runExclusive(seriesId, async () =>
      this.recomputeLocked(await this.requireSeries(seriesId))
    );
  }

  async transferOwnership(
    actor: Actor,
    seriesId: string,
    newOwnerUrn: string
  ): Promise<Series> {
    if (!actor.isAdmin) {
      throw new CatalogServiceError(
        "FORBIDDEN",
        "Only admins can transfer series ownership"
      );
    }
    if (!isValidUrn(newOwnerUrn, "user")) {
      throw new CatalogServiceError(
        "INVALID_ARGUMENT",
        `New owner must be a user URN, got '${newOwnerUrn}'`
      );
    }

    const updated = await this.locks.runExclusive(seriesId, async () => {
      const series = await this.requireSeries(seriesId);
      if (series.createdBy === newOwnerUrn) {
        throw new CatalogServiceError(
          "FAILED_PRECONDITION",
          "New owner is already the current owner"
        );
      }
      const next = {
        ...series,
        createdBy: newOwnerUrn,
        updatedAt: this.timestamp(),
      };
      await this.repo.updateSeries(next);
      this.logger.info(
        { seriesId, from: series.createdBy, to: newOwnerUrn },
        "Transferred series ownership"
      );
      return next;
    });

    await this.emitCatalogEvent({
      entity: "series",
      entityId: seriesId,
      operation: "update",
      actor,
      payload: { ownerTransferredTo: newOwnerUrn },
    });
    return updated;
  }

  async createUnit(
    actor: Actor,
    seriesId: string,
    input: CreateUnitInput
  ): Promise<Unit> {
    await this.assertCanEdit(actor, seriesId);

    const unit = await this.locks.runExclusive(seriesId, async () => {
      const series = await this.requireSeries(seriesId);
      const now = this.timestamp();
      const created: Unit = {
        id: createUnitUrn(),
        seriesId: series.id,
        unitNumber: input.unitNumber,
        title: input.title ?? `Unit ${input.unitNumber}`,
        language: input.language,
        pageCount: input.pageCount ?? 0,
        folderPath: input.folderPath,
        description: input.description,
        tags: input.tags,
        contentWarnings: input.contentWarnings,
        authors: input.authors,
        localized: input.localized,
        allowedEditors: [],
        createdBy: actor.userUrn,
        createdAt: now,
        updatedAt: now,
      };
      await this.repo.createUnit(created);
      await this.recomputeLocked(series);
      return created;
    });

    this.logger.info(
      { seriesId, unitId: unit.id, uploader: actor.userUrn },
      "Created unit"
    );
    await this.emitCatalogEvent({
      entity: "unit",
      entityId: unit.id,
      operation: "create",
      actor,
      payload: { seriesId },
    });
    return unit;
  }

  async getUnit(
    seriesId: string,
    unitId: string,
    options: GetUnitOptions = {}
  ): Promise<Unit> {
    const unit = await this.requireUnit(seriesId, unitId);
    if (!options.inherit) {
      return unit;
    }
    const series = await this.requireSeries(seriesId);
    return this.aggregator.inherit(unit, series, options.language);
  }

  async listUnits(seriesId: string): Promise<Unit[]> {
    await this.requireSeries(seriesId);
    return this.repo.getUnitsOfSeries(seriesId);
  }

  async updateUnit(
    actor: Actor,
    seriesId: string,
    unitId: string,
    input: UpdateUnitInput
  ): Promise<Unit> {
    await this.assertCanEdit(actor, unitId);

    const updated = await this.locks.runExclusive(seriesId, async () => {
      const series = await this.requireSeries(seriesId);
      const unit = await this.locks.runExclusive(unitId, async () => {
        const current = await this.requireUnit(seriesId, unitId);
        const { tags, contentWarnings, authors, localized, ...fields } = input;
        const next: Unit = {
          ...current,
          ...fields,
          ...(tags !== undefined ? { tags: tags ?? undefined } : {}),
          ...(contentWarnings !== undefined
            ? { contentWarnings: contentWarnings ?? undefined }
            : {}),
          ...(authors !== undefined ? { authors: authors ?? undefined } : {}),
          ...(localized !== undefined
            ? { localized: localized ?? undefined }
            : {}),
          updatedAt: this.timestamp(),
        };
        await this.repo.updateUnit(next);
        return next;
      });
      await this.recomputeLocked(series);
      return unit;
    });

    await this.emitCatalogEvent({
      entity: "unit",
      entityId: unitId,
      operation: "update",
      actor,
      payload: { seriesId, fields: Object.keys(input) },
    });
    return updated;
  }

  async deleteUnit(actor: Actor, seriesId: string, unitId: string): Promise<void> {
    await this.assertCanEdit(actor, unitId);

    await this.locks.runExclusive(seriesId, async () => {
      const series = await this.requireSeries(seriesId);
      await this.locks.runExclusive(unitId, async () => {
        await this.requireUnit(seriesId, unitId);
        await this.repo.deleteUnit(unitId);
      });
      await this.recomputeLocked(series);
    });

    this.logger.info({ seriesId, unitId, actor: actor.userUrn }, "Deleted unit");
    await this.emitCatalogEvent({
      entity: "unit",
      entityId: unitId,
      operation: "delete",
      actor,
      payload: { seriesId },
    });
  }

  async grantPermission(
    actor: Actor,
    targetUrn: string,
    userUrn: string
  ): Promise<string[]> {
    const owner = await this.assertCanManagePermissions(actor, targetUrn);
    const user = tryParseUrn(userUrn);
    if (user && formatUrn(user) === owner) {
      throw new CatalogServiceError(
        "FAILED_PRECONDITION",
        `${owner} already owns ${targetUrn}`
      );
    }
    const editors = await this.permissions
      .grant(targetUrn, userUrn, actor.userUrn)
      .catch(translatePermissionError);
    await this.emitCatalogEvent({
      entity: "permission",
      entityId: targetUrn,
      operation: "create",
      actor,
      payload: { userUrn },
    });
    return editors;
  }

  async revokePermission(
    actor: Actor,
    targetUrn: string,
    userUrn: string
  ): Promise<string[]> {
    await this.assertCanManagePermissions(actor, targetUrn);
    const editors = await this.permissions
      .revoke(targetUrn, userUrn)
      .catch(translatePermissionError);
    await this.emitCatalogEvent({
      entity: "permission",
      entityId: targetUrn,
      operation: "delete",
      actor,
      payload: { userUrn },
    });
    return editors;
  }

  async listPermissions(
    actor: Actor,
    targetUrn: string
  ): Promise<{
    editors: string[];
    grants: EditPermission[];
  }> {
    await this.assertCanManagePermissions(actor, targetUrn);
    const [editors, grants] = await Promise.all([
      this.permissions.list(targetUrn),
      this.permissions.listRecords(targetUrn),
    ]).catch(translatePermissionError);
    return { editors, grants };
  }
}
