import {
  InMemoryCatalogRepository,
} from "../repositories/catalog-repository";
import type { Series, Unit } from "../schemas/catalog";
import {
  PermissionError,
  PermissionResolver,
} from "../services/permission-resolver";
import {
  EDITOR,
  makeSeries,
  makeUnit,
  nextTick,
  OWNER,
  SERIES_ID,
  STRANGER,
  UNIT_ID,
  UPLOADER,
} from "./fixtures";

const GRANTED_AT = "2026-01-02T03:04:05.000Z";

// Yields between every read and write so unserialized updates would interleave.
class SlowRepository extends InMemoryCatalogRepository {
  async getSeries(id: string): Promise<Series | null> {
    await nextTick();
    return super.getSeries(id);
  }

  async updateSeries(series: Series): Promise<void> {
    await nextTick();
    return super.updateSeries(series);
  }

  async getUnit(id: string): Promise<Unit | null> {
    await nextTick();
    return super.getUnit(id);
  }
}

async function setup(repository = new InMemoryCatalogRepository()) {
  await repository.createSeries(makeSeries());
  await repository.createUnit(makeUnit());
  const resolver = new PermissionResolver({
    repository,
    now: () => new Date(GRANTED_AT),
  });
  return { repository, resolver };
}

describe("PermissionResolver.isAuthorized", () => {
  it("authorizes the series owner on the series and its units", async () => {
    const { resolver } = await setup();

    await expect(resolver.isAuthorized(SERIES_ID, OWNER)).resolves.toBe(true);
    await expect(resolver.isAuthorized(UNIT_ID, OWNER)).resolves.toBe(true);
  });

  it("authorizes the uploader on the unit only", async () => {
    const { resolver } = await setup();

    await expect(resolver.isAuthorized(UNIT_ID, UPLOADER)).resolves.toBe(true);
    await expect(resolver.isAuthorized(SERIES_ID, UPLOADER)).resolves.toBe(false);
  });

  it("denies everyone else", async () => {
    const { resolver } = await setup();

    await expect(resolver.isAuthorized(SERIES_ID, STRANGER)).resolves.toBe(false);
    await expect(resolver.isAuthorized(UNIT_ID, STRANGER)).resolves.toBe(false);
  });

  it("returns false instead of throwing on bad input", async () => {
    const { resolver } = await setup();

    await expect(resolver.isAuthorized("garbage", OWNER)).resolves.toBe(false);
    await expect(resolver.isAuthorized(SERIES_ID, "garbage")).resolves.toBe(false);
    await expect(
      resolver.isAuthorized("urn:mvn:series:missing", OWNER)
    ).resolves.toBe(false);
    await expect(
      resolver.isAuthorized("urn:mvn:asset:a1", OWNER)
    ).resolves.toBe(false);
  });
});

describe("PermissionResolver.grant and revoke", () => {
  it("grants edit rights and records who granted them", async () => {
    const { resolver, repository } = await setup();

    await expect(resolver.grant(SERIES_ID, EDITOR, OWNER)).resolves.toEqual([
      EDITOR,
    ]);
    await expect(resolver.isAuthorized(SERIES_ID, EDITOR)).resolves.toBe(true);
    expect((await repository.getSeries(SERIES_ID))?.allowedEditors).toEqual([
      EDITOR,
    ]);
    await expect(resolver.listRecords(SERIES_ID)).resolves.toEqual([
      {
        targetUrn: SERIES_ID,
        userUrn: EDITOR,
        grantedBy: OWNER,
        grantedAt: GRANTED_AT,
      },
    ]);
  });

  it("cascades series grants to units", async () => {
    const { resolver } = await setup();

    await resolver.grant(SERIES_ID, EDITOR, OWNER);

    await expect(resolver.isAuthorized(UNIT_ID, EDITOR)).resolves.toBe(true);
  });

  it("keeps unit grants on the unit", async () => {
    const { resolver } = await setup();

    await resolver.grant(UNIT_ID, EDITOR, OWNER);

    await expect(resolver.isAuthorized(UNIT_ID, EDITOR)).resolves.toBe(true);
    await expect(resolver.isAuthorized(SERIES_ID, EDITOR)).resolves.toBe(false);
  });

  it("is idempotent", async () => {
    const { resolver } = await setup();

    await resolver.grant(SERIES_ID, EDITOR, OWNER);
    await expect(resolver.grant(SERIES_ID, EDITOR, OWNER)).resolves.toEqual([
      EDITOR,
    ]);
    await expect(resolver.listRecords(SERIES_ID)).resolves.toHaveLength(1);

    await expect(resolver.revoke(SERIES_ID, EDITOR)).resolves.toEqual([]);
    await expect(resolver.revoke(SERIES_ID, EDITOR)).resolves.toEqual([]);
    await expect(resolver.listRecords(SERIES_ID)).resolves.toEqual([]);
    await expect(resolver.isAuthorized(SERIES_ID, EDITOR)).resolves.toBe(false);
  });

  it("never revokes ownership", async () => {
    const { resolver } = await setup();

    await expect(resolver.revoke(SERIES_ID, OWNER)).resolves.toEqual([]);
    await expect(resolver.isAuthorized(SERIES_ID, OWNER)).resolves.toBe(true);
  });

  it("canonicalizes URNs before storing them", async () => {
    const { resolver } = await setup();

    await expect(
      resolver.grant("URN:MVN:SERIES:s1", "urn:MVN:user:editor", OWNER)
    ).resolves.toEqual([EDITOR]);
    await expect(resolver.list(SERIES_ID)).resolves.toEqual([EDITOR]);
  });

  it.each([
    ["garbage", EDITOR, "INVALID_ARGUMENT"],
    ["urn:mvn:asset:a1", EDITOR, "INVALID_ARGUMENT"],
    [SERIES_ID, "urn:mvn:series:s2", "INVALID_ARGUMENT"],
    [SERIES_ID, "garbage", "INVALID_ARGUMENT"],
    ["urn:mvn:series:missing", EDITOR, "NOT_FOUND"],
    ["urn:mvn:unit:missing", EDITOR, "NOT_FOUND"],
  ])("rejects grant(%s, %s) with %s", async (target, user, code) => {
    const { resolver } = await setup();

    const failure = resolver.grant(target, user, OWNER);
    await expect(failure).rejects.toBeInstanceOf(PermissionError);
    await expect(failure).rejects.toMatchObject({ code });
  });

  it("carries the URN failure for malformed targets", async () => {
    const { resolver } = await setup();

    await expect(resolver.revoke("urn:mvn:unknown:1", EDITOR)).rejects.toMatchObject({
      code: "INVALID_ARGUMENT",
      urnFailure: { kind: "UnknownType" },
    });
  });

  it("loses no grants under concurrency", async () => {
    const { resolver, repository } = await setup(new SlowRepository());
    const users = Array.from(
      { length: 100 },
      (_, index) => `urn:mvn:user:user-${index}`
    );

    await Promise.all(users.map((user) => resolver.grant(SERIES_ID, user, OWNER)));

    const editors = (await repository.getSeries(SERIES_ID))?.allowedEditors ?? [];
    expect(editors).toHaveLength(100);
    expect(new Set(editors)).toEqual(new Set(users));
  });

  it("applies interleaved grants and revokes to the final state", async () => {
    const { resolver } = await setup(new SlowRepository());
    await resolver.grant(SERIES_ID, STRANGER, OWNER);

    await Promise.all([
      resolver.grant(SERIES_ID, EDITOR, OWNER),
      resolver.revoke(SERIES_ID, STRANGER),
      resolver.grant(SERIES_ID, UPLOADER, OWNER),
    ]);

    await expect(resolver.list(SERIES_ID)).resolves.toEqual([EDITOR, UPLOADER]);
  });
});
