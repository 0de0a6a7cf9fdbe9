import { randomUUID } from "node:crypto";

/**
 * Resource names used across the catalog: `urn:{namespace}:{type}:{id}`.
 *
 * - `mvn` names internal resources; `type` must be one of {@link MVN_TYPES}
 *   and `id` is restricted to `[a-zA-Z0-9_-]`.
 * - `src` names resources of an external source system; `type` holds the
 *   source name and `id` is kept verbatim, colons included.
 */

export const URN_PREFIX = "urn";
export const URN_DELIMITER = ":";
export const MAX_URN_LENGTH = 512;
export const MAX_COMPONENT_LENGTH = 256;

export const MVN_NAMESPACE = "mvn";
export const SRC_NAMESPACE = "src";

export const MVN_TYPES = Object.freeze([
  "series",
  "unit",
  "user",
  "asset",
  "comment",
  "error",
  "collection",
  "tag",
  "annotation",
  "session",
] as const);

export type MvnType = (typeof MVN_TYPES)[number];
export type UrnNamespace = typeof MVN_NAMESPACE | typeof SRC_NAMESPACE;

const MVN_TYPE_SET: ReadonlySet<string> = new Set<string>(MVN_TYPES);
const COMPONENT_PATTERN = /^[a-zA-Z0-9_-]+$/;

export type Urn = {
  readonly namespace: UrnNamespace;
  readonly type: string;
  readonly id: string;
};

export type UrnErrorKind =
  | "MalformedUrn"
  | "UnknownNamespace"
  | "UnknownType"
  | "InvalidComponent"
  | "TooLong"
  | "Empty"
  | "NotApplicable";

export type UrnFailure = {
  kind: UrnErrorKind;
  message: string;
};

export type UrnResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: UrnFailure };

export class UrnError extends Error {
  constructor(
    public readonly kind: UrnErrorKind,
    message: string
  ) {
    super(message);
    this.name = "UrnError";
  }

  static from(failure: UrnFailure) {
    return new UrnError(failure.kind, failure.message);
  }
}

function succeed<T>(value: T): UrnResult<T> {
  return { ok: true, value };
}

function fail(kind: UrnErrorKind, message: string): { ok: false; error: UrnFailure } {
  return { ok: false, error: { kind, message } };
}

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function isMvnType(value: string): value is MvnType {
  return MVN_TYPE_SET.has(value);
}

/** Throws the carried failure as a {@link UrnError}. */
export function unwrapUrn<T>(result: UrnResult<T>): T {
  if (!result.ok) {
    throw UrnError.from(result.error);
  }
  return result.value;
}

export function formatUrn(urn: Urn): string {
  return [URN_PREFIX, urn.namespace, urn.type, urn.id].join(URN_DELIMITER);
}

export function createUrn(type: MvnType): string {
  if (!isMvnType(type)) {
    throw new UrnError("UnknownType", `Unknown URN type '${String(type)}'`);
  }
  return formatUrn({ namespace: MVN_NAMESPACE, type, id: randomUUID() });
}

export const createSeriesUrn = () => createUrn("series");
export const createUnitUrn = () => createUrn("unit");
export const createUserUrn = () => createUrn("user");
export const createAssetUrn = () => createUrn("asset");
export const createCollectionUrn = () => createUrn("collection");
export const createTagUrn = () => createUrn("tag");

export function createErrorUrn(code: string): UrnResult<string> {
  if (isBlank(code)) {
    return fail("Empty", "Error code cannot be empty");
  }
  if (!COMPONENT_PATTERN.test(code)) {
    return fail(
      "InvalidComponent",
      `Error code '${code}' may only contain letters, digits, '-' and '_'`
    );
  }
  if (code.length > MAX_COMPONENT_LENGTH) {
    return fail(
      "TooLong",
      `Error code exceeds ${MAX_COMPONENT_LENGTH} characters`
    );
  }
  return succeed(
    formatUrn({ namespace: MVN_NAMESPACE, type: "error", id: code.toLowerCase() })
  );
}

export function createSourceUrn(source: string, id: string): UrnResult<string> {
  if (isBlank(source)) {
    return fail("Empty", "Source cannot be empty");
  }
  if (isBlank(id)) {
    return fail("Empty", "Source id cannot be empty");
  }
  if (!COMPONENT_PATTERN.test(source)) {
    return fail(
      "InvalidComponent",
      `Source '${source}' may only contain letters, digits, '-' and '_'`
    );
  }
  const urn = formatUrn({
    namespace: SRC_NAMESPACE,
    type: source.toLowerCase(),
    id,
  });
  if (urn.length > MAX_URN_LENGTH) {
    return fail("TooLong", `URN would exceed ${MAX_URN_LENGTH} characters`);
  }
  return succeed(urn);
}

function parseMvn(text: string, parts: string[]): UrnResult<Urn> {
  if (parts.length < 4) {
    return fail(
      "MalformedUrn",
      `Invalid URN '${text}', expected urn:mvn:{type}:{id}`
    );
  }
  const type = parts[2];
  if (isBlank(type)) {
    return fail("Empty", `Invalid URN '${text}', type is empty`);
  }
  const normalizedType = type.toLowerCase();
  if (!isMvnType(normalizedType)) {
    return fail(
      "UnknownType",
      `Invalid URN '${text}', unknown type '${type}'. Valid types: ${MVN_TYPES.join(", ")}`
    );
  }
  const id = parts.slice(3).join(URN_DELIMITER);
  if (isBlank(id)) {
    return fail("Empty", `Invalid URN '${text}', id is empty`);
  }
  if (!COMPONENT_PATTERN.test(id)) {
    return fail(
      "InvalidComponent",
      `Invalid URN '${text}', id contains invalid characters`
    );
  }
  if (id.length > MAX_COMPONENT_LENGTH) {
    return fail(
      "TooLong",
      `Invalid URN '${text}', id exceeds ${MAX_COMPONENT_LENGTH} characters`
    );
  }
  return succeed({ namespace: MVN_NAMESPACE, type: normalizedType, id });
}

function parseSrc(text: string, parts: string[]): UrnResult<Urn> {
  if (parts.length < 4) {
    return fail(
      "MalformedUrn",
      `Invalid URN '${text}', expected urn:src:{source}:{id}`
    );
  }
  const source = parts[2];
  if (isBlank(source)) {
    return fail("Empty", `Invalid URN '${text}', source is empty`);
  }
  if (!COMPONENT_PATTERN.test(source)) {
    return fail(
      "InvalidComponent",
      `Invalid URN '${text}', source contains invalid characters`
    );
  }
  // Everything after the source belongs to the id, colons included.
  const id = parts.slice(3).join(URN_DELIMITER);
  if (isBlank(id)) {
    return fail("Empty", `Invalid URN '${text}', id is empty`);
  }
  if (id.length > MAX_COMPONENT_LENGTH) {
    return fail(
      "TooLong",
      `Invalid URN '${text}', id exceeds ${MAX_COMPONENT_LENGTH} characters`
    );
  }
  return succeed({ namespace: SRC_NAMESPACE, type: source.toLowerCase(), id });
}

export function parseUrn(text: string): UrnResult<Urn> {
  // Length is checked before anything else so oversized input is never split.
  if (text.length > MAX_URN_LENGTH) {
    return fail("TooLong", `URN exceeds ${MAX_URN_LENGTH} characters`);
  }
  if (isBlank(text)) {
    return fail("Empty", "URN cannot be empty");
  }

  const parts = text.split(URN_DELIMITER);
  if (parts.length < 3 || parts[0].toLowerCase() !== URN_PREFIX) {
    return fail(
      "MalformedUrn",
      `Invalid URN '${text}', expected urn:{namespace}:{type}:{id}`
    );
  }

  const namespace = parts[1].toLowerCase();
  switch (namespace) {
    case MVN_NAMESPACE:
      return parseMvn(text, parts);
    case SRC_NAMESPACE:
      return parseSrc(text, parts);
    default:
      return fail(
        "UnknownNamespace",
        `Unknown URN namespace '${namespace}', expected '${MVN_NAMESPACE}' or '${SRC_NAMESPACE}'`
      );
  }
}

export function parseUrnOrThrow(text: string): Urn {
  return unwrapUrn(parseUrn(text));
}

export function tryParseUrn(text: string | null | undefined): Urn | null {
  if (typeof text !== "string") {
    return null;
  }
  const result = parseUrn(text);
  return result.ok ? result.value : null;
}

export function isValidUrn(
  text: string | null | undefined,
  expectedType?: MvnType
): boolean {
  const urn = tryParseUrn(text);
  if (!urn) {
    return false;
  }
  if (!expectedType) {
    return true;
  }
  return urn.namespace === MVN_NAMESPACE && urn.type === expectedType;
}

export function extractId(text: string): UrnResult<string> {
  const parsed = parseUrn(text);
  if (!parsed.ok) {
    return parsed;
  }
  return succeed(parsed.value.id);
}

export function extractType(text: string): UrnResult<string> {
  const parsed = parseUrn(text);
  if (!parsed.ok) {
    return parsed;
  }
  if (parsed.value.namespace !== MVN_NAMESPACE) {
    return fail(
      "NotApplicable",
      `Source URN '${text}' has no resource type`
    );
  }
  return succeed(parsed.value.type);
}

function normalizeTypedUrn(type: MvnType, value: string): UrnResult<string> {
  if (isBlank(value)) {
    return fail("Empty", `${type} id cannot be empty`);
  }
  const prefix = [URN_PREFIX, MVN_NAMESPACE, type, ""].join(URN_DELIMITER);
  const candidate = value.toLowerCase().startsWith(prefix)
    ? value
    : `${prefix}${value}`;
  const parsed = parseUrn(candidate);
  if (!parsed.ok) {
    return parsed;
  }
  return succeed(formatUrn(parsed.value));
}

/** Accepts a bare id or a full series URN and returns the canonical URN. */
export const normalizeSeriesUrn = (value: string) =>
  normalizeTypedUrn("series", value);
export const normalizeUnitUrn = (value: string) =>
  normalizeTypedUrn("unit", value);
export const normalizeUserUrn = (value: string) =>
  normalizeTypedUrn("user", value);
