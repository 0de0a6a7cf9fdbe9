import type { Logger } from "pino";
import { getLogger } from "../lib/logger";
import { recordPermissionMutation } from "../observability/metrics";
import type { CatalogRepository } from "../repositories/catalog-repository";
import type { EditPermission, Series, Unit } from "../schemas/catalog";
import { KeyedLock } from "../utils/keyed-lock";
import {
  formatUrn,
  MVN_NAMESPACE,
  parseUrn,
  tryParseUrn,
  type UrnFailure,
} from "../utils/urn";

export type PermissionErrorCode = "NOT_FOUND" | "INVALID_ARGUMENT";

export class PermissionError extends Error {
  constructor(
    public readonly code: PermissionErrorCode,
    message: string,
    public readonly urnFailure?: UrnFailure
  ) {
    super(message);
    this.name = "PermissionError";
  }
}

export type PermissionStore = Pick<
  CatalogRepository,
  | "getSeries"
  | "getUnit"
  | "updateSeries"
  | "updateUnit"
  | "recordPermissionGrant"
  | "removePermissionGrant"
  | "listPermissionGrants"
>;

type TargetRef = { urn: string; kind: "series" | "unit" };

type Target =
  | { kind: "series"; record: Series }
  | { kind: "unit"; record: Unit };

export type PermissionResolverOptions = {
  repository: PermissionStore;
  locks?: KeyedLock;
  logger?: Logger;
  now?: () => Date;
};

function asTargetRef(urn: string | null | undefined): TargetRef | null {
  const parsed = tryParseUrn(urn);
  if (!parsed || parsed.namespace !== MVN_NAMESPACE) {
    return null;
  }
  const kind =
    parsed.type === "series" ? "series" : parsed.type === "unit" ? "unit" : null;
  return kind ? { urn: formatUrn(parsed), kind } : null;
}

function asUserUrn(urn: string | null | undefined): string | null {
  const parsed = tryParseUrn(urn);
  if (!parsed || parsed.namespace !== MVN_NAMESPACE || parsed.type !== "user") {
    return null;
  }
  return formatUrn(parsed);
}

/**
 * Edit rights on series and units.
 *
 * A user may edit a target when they own it, when they own the unit's
 * parent series, when they are listed in the target's allowed editors, or,
 * for a unit, when they are listed in the parent series' allowed editors.
 * Grant and revoke are serialized per target URN, and unit grants also hold
 * the parent series lock.
 */
export class PermissionResolver {
  private readonly repository: PermissionStore;
  private readonly locks: KeyedLock;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: PermissionResolverOptions) {
    this.repository = options.repository;
    this.locks = options.locks ?? new KeyedLock("catalog");
    this.logger = (options.logger ?? getLogger()).child({
      component: "permission-resolver",
    });
    this.now = options.now ?? (() => new Date());
  }

  async grant(
    targetUrn: string,
    userUrn: string,
    grantedBy: string
  ): Promise<string[]> {
    const ref = this.requireTarget(targetUrn);
    const user = this.requireUser(userUrn);

    return this.withTargetLock(ref, async () => {
      const target = await this.requireLoaded(ref);
      const editors = target.record.allowedEditors;
      if (editors.includes(user)) {
        recordPermissionMutation("grant", ref.kind, false);
        return [...editors];
      }

      const next = [...editors, user];
      const grantedAt = this.now().toISOString();
      await this.persist(target, next, grantedAt);
      await this.repository.recordPermissionGrant({
        targetUrn: ref.urn,
        userUrn: user,
        grantedBy,
        grantedAt,
      });

      recordPermissionMutation("grant", ref.kind, true);
      this.logger.info(
        { targetUrn: ref.urn, userUrn: user, grantedBy },
        "Granted edit permission"
      );
      return next;
    });
  }

  async revoke(targetUrn: string, userUrn: string): Promise<string[]> {
    const ref = this.requireTarget(targetUrn);
    const user = this.requireUser(userUrn);

    return this.withTargetLock(ref, async () => {
      const target = await this.requireLoaded(ref);
      const editors = target.record.allowedEditors;
      if (!editors.includes(user)) {
        recordPermissionMutation("revoke", ref.kind, false);
        return [...editors];
      }

      const next = editors.filter((editor) => editor !== user);
      await this.persist(target, next, this.now().toISOString());
      await this.repository.removePermissionGrant(ref.urn, user);

      recordPermissionMutation("revoke", ref.kind, true);
      this.logger.info(
        { targetUrn: ref.urn, userUrn: user },
        "Revoked edit permission"
      );
      return next;
    });
  }

  /** False for malformed URNs and unknown targets as well as for denials. */
  async isAuthorized(targetUrn: string, userUrn: string): Promise<boolean> {
    const ref = asTargetRef(targetUrn);
    const user = asUserUrn(userUrn);
    if (!ref || !user) {
      return false;
    }

    const target = await this.load(ref);
    if (!target) {
      return false;
    }
    if (target.record.createdBy === user) {
      return true;
    }

    if (target.kind === "series") {
      return target.record.allowedEditors.includes(user);
    }

    const parent = await this.repository.getSeries(target.record.seriesId);
    if (parent?.createdBy === user) {
      return true;
    }
    if (target.record.allowedEditors.includes(user)) {
      return true;
    }
    return parent?.allowedEditors.includes(user) ?? false;
  }

  async list(targetUrn: string): Promise<string[]> {
    const target = await this.requireLoaded(this.requireTarget(targetUrn));
    return [...target.record.allowedEditors];
  }

  async listRecords(targetUrn: string): Promise<EditPermission[]> {
    const ref = this.requireTarget(targetUrn);
    await this.requireLoaded(ref);
    return this.repository.listPermissionGrants(ref.urn);
  }

  private requireTarget(targetUrn: string): TargetRef {
    const parsed = parseUrn(targetUrn);
    if (!parsed.ok) {
      throw new PermissionError(
        "INVALID_ARGUMENT",
        parsed.error.message,
        parsed.error
      );
    }
    const ref = asTargetRef(targetUrn);
    if (!ref) {
      throw new PermissionError(
        "INVALID_ARGUMENT",
        `Edit permissions apply to series and units, not '${targetUrn}'`
      );
    }
    return ref;
  }

  private requireUser(userUrn: string): string {
    const parsed = parseUrn(userUrn);
    if (!parsed.ok) {
      throw new PermissionError(
        "INVALID_ARGUMENT",
        parsed.error.message,
        parsed.error
      );
    }
    const user = asUserUrn(userUrn);
    if (!user) {
      throw new PermissionError(
        "INVALID_ARGUMENT",
        `Expected a user URN, got '${userUrn}'`
      );
    }
    return user;
  }

  /**
   * Unit targets take the parent series lock before the unit lock, the same
   * order unit writes and series deletion use.
   */
  private async withTargetLock<T>(
    ref: TargetRef,
    task: () => Promise<T>
  ): Promise<T> {
    if (ref.kind === "series") {
      return this.locks.runExclusive(ref.urn, task);
    }
    const unit = await this.repository.getUnit(ref.urn);
    if (!unit) {
      throw new PermissionError("NOT_FOUND", `${ref.urn} not found`);
    }
    return this.locks.runExclusive(unit.seriesId, () =>
      this.locks.runExclusive(ref.urn, task)
    );
  }

  private async load(ref: TargetRef): Promise<Target | null> {
    if (ref.kind === "series") {
      const record = await this.repository.getSeries(ref.urn);
      return record ? { kind: "series", record } : null;
    }
    const record = await this.repository.getUnit(ref.urn);
    return record ? { kind: "unit", record } : null;
  }

  private async requireLoaded(ref: TargetRef): Promise<Target> {
    const target = await this.load(ref);
    if (!target) {
      throw new PermissionError("NOT_FOUND", `${ref.urn} not found`);
    }
    return target;
  }

  private async persist(
    target: Target,
    allowedEditors: string[],
    updatedAt: string
  ) {
    if (target.kind === "series") {
      await this.repository.updateSeries({
        ...target.record,
        allowedEditors,
        updatedAt,
      });
      return;
    }
    await this.repository.updateUnit({
      ...target.record,
      allowedEditors,
      updatedAt,
    });
  }
}
