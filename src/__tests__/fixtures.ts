import type { Series, Unit } from "../schemas/catalog";

export const OWNER = "urn:mvn:user:owner";
export const UPLOADER = "urn:mvn:user:uploader";
export const EDITOR = "urn:mvn:user:editor";
export const STRANGER = "urn:mvn:user:stranger";

export const SERIES_ID = "urn:mvn:series:s1";
export const UNIT_ID = "urn:mvn:unit:u1";

export const CREATED_AT = "2026-01-01T00:00:00.000Z";

export function makeSeries(overrides: Partial<Series> = {}): Series {
  return {
    id: SERIES_ID,
    title: "Harbor Lights",
    description: "",
    mediaType: "manga",
    externalLinks: {},
    tags: [],
    contentWarnings: [],
    authors: [],
    scanlators: [],
    groups: [],
    altTitles: [],
    createdBy: OWNER,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    localized: {},
    allowedEditors: [],
    ...overrides,
  };
}

export function makeUnit(overrides: Partial<Unit> = {}): Unit {
  return {
    id: UNIT_ID,
    seriesId: SERIES_ID,
    unitNumber: 1,
    title: "Unit 1",
    pageCount: 0,
    allowedEditors: [],
    createdBy: UPLOADER,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

export function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export const nextTick = () =>
  new Promise<void>((resolve) => setImmediate(resolve));
