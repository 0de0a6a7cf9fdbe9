import type { Logger } from "pino";
import { getLogger } from "../lib/logger";
import { recordAggregation } from "../observability/metrics";
import type {
  Author,
  LocalizedMetadata,
  Scanlator,
  Series,
  Unit,
  UnitLocalizedMetadata,
} from "../schemas/catalog";

function hasText(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function unionStrings(
  seed: readonly string[],
  contributions: Iterable<readonly string[] | undefined>
): string[] {
  const seen = new Set<string>();
  const add = (values: readonly string[] | undefined) => {
    for (const value of values ?? []) {
      if (hasText(value)) {
        seen.add(value);
      }
    }
  };
  add(seed);
  for (const values of contributions) {
    add(values);
  }
  return Array.from(seen);
}

type Keyed = { id: string };

/**
 * Entries are keyed by id. A repeated id keeps its first position and takes
 * the later entry's non-empty fields.
 */
function mergeKeyed<T extends Keyed>(
  into: Map<string, T>,
  entries: readonly T[] | undefined,
  merge: (previous: T, next: T) => T
) {
  for (const entry of entries ?? []) {
    if (!hasText(entry.id)) {
      continue;
    }
    const previous = into.get(entry.id);
    into.set(entry.id, previous ? merge(previous, entry) : entry);
  }
}

function mergeAuthor(previous: Author, next: Author): Author {
  const role = hasText(next.role) ? next.role : previous.role;
  return {
    id: previous.id,
    name: hasText(next.name) ? next.name : previous.name,
    ...(role !== undefined ? { role } : {}),
  };
}

function mergeScanlator(previous: Scanlator, next: Scanlator): Scanlator {
  return {
    id: previous.id,
    name: hasText(next.name) ? next.name : previous.name,
    role: next.role,
  };
}

function aggregateLocalized(
  series: Series,
  units: readonly Unit[]
): Record<string, LocalizedMetadata> {
  const scanlatorsByLanguage = new Map<string, Map<string, Scanlator>>();
  const languageBlocks = new Map<string, LocalizedMetadata>();

  for (const [language, block] of Object.entries(series.localized)) {
    languageBlocks.set(language, block);
  }

  const scanlatorsFor = (language: string) => {
    let keyed = scanlatorsByLanguage.get(language);
    if (!keyed) {
      keyed = new Map<string, Scanlator>();
      mergeKeyed(keyed, languageBlocks.get(language)?.scanlators, mergeScanlator);
      scanlatorsByLanguage.set(language, keyed);
    }
    return keyed;
  };

  for (const unit of units) {
    const localized: Record<string, UnitLocalizedMetadata> = unit.localized ?? {};
    for (const [language, block] of Object.entries(localized)) {
      if (!hasText(language)) {
        continue;
      }
      if (!languageBlocks.has(language)) {
        languageBlocks.set(language, {});
      }
      mergeKeyed(scanlatorsFor(language), block.scanlators, mergeScanlator);
    }
  }

  const result: Record<string, LocalizedMetadata> = {};
  for (const [language, block] of languageBlocks) {
    const keyed = scanlatorsByLanguage.get(language);
    result[language] = keyed
      ? { ...block, scanlators: Array.from(keyed.values()) }
      : block;
  }
  return result;
}

/**
 * Rolls unit metadata up into the series. Series-level values are the
 * baseline and are never removed; everything outside tags, warnings,
 * authors and scanlators passes through untouched. Running the result back
 * through with the same units yields an identical value.
 *
 * The unit list must be the complete, current set for the series.
 */
export function recomputeSeries(series: Series, units: readonly Unit[]): Series {
  const tags = unionStrings(
    series.tags,
    units.map((unit) => unit.tags)
  );
  const contentWarnings = unionStrings(
    series.contentWarnings,
    units.map((unit) => unit.contentWarnings)
  );

  const authors = new Map<string, Author>();
  mergeKeyed(authors, series.authors, mergeAuthor);
  for (const unit of units) {
    mergeKeyed(authors, unit.authors, mergeAuthor);
  }

  const localized = aggregateLocalized(series, units);

  const scanlators = new Map<string, Scanlator>();
  mergeKeyed(scanlators, series.scanlators, mergeScanlator);
  for (const block of Object.values(localized)) {
    mergeKeyed(scanlators, block.scanlators, mergeScanlator);
  }

  return {
    ...series,
    tags,
    contentWarnings,
    authors: Array.from(authors.values()),
    scanlators: Array.from(scanlators.values()),
    localized,
  };
}

/**
 * Read-time view of a unit: fields the unit leaves unset fall back to the
 * series. With a language, a unit without its own localized block borrows
 * that language's series scanlators.
 */
export function inheritFromSeries(
  unit: Unit,
  series: Series,
  language?: string
): Unit {
  let localized = unit.localized;
  if (!localized && language && series.localized[language]) {
    localized = {
      [language]: { scanlators: series.localized[language].scanlators ?? [] },
    };
  }

  return {
    ...unit,
    tags: unit.tags ?? series.tags,
    contentWarnings: unit.contentWarnings ?? series.contentWarnings,
    authors: unit.authors ?? series.authors,
    ...(localized ? { localized } : {}),
  };
}

export type TaxonomyAggregatorOptions = {
  logger?: Logger;
};

export class TaxonomyAggregator {
  private readonly logger: Logger;

  constructor(options: TaxonomyAggregatorOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({
      component: "taxonomy-aggregator",
    });
  }

  recompute(series: Series, units: readonly Unit[]): Series {
    const result = recomputeSeries(series, units);
    recordAggregation(units.length);
    this.logger.debug(
      {
        seriesId: series.id,
        units: units.length,
        tags: result.tags.length,
        contentWarnings: result.contentWarnings.length,
        authors: result.authors.length,
        scanlators: result.scanlators.length,
        languages: Object.keys(result.localized).length,
      },
      "Recomputed series metadata"
    );
    return result;
  }

  inherit(unit: Unit, series: Series, language?: string): Unit {
    return inheritFromSeries(unit, series, language);
  }
}
