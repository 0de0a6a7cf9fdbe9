import type { Scanlator } from "../schemas/catalog";
import {
  inheritFromSeries,
  recomputeSeries,
  TaxonomyAggregator,
} from "../services/taxonomy-aggregator";
import { makeSeries, makeUnit } from "./fixtures";

const groupOne: Scanlator = { id: "g1", name: "Group One", role: "translation" };
const groupTwo: Scanlator = { id: "g2", name: "Grupo Dos", role: "both" };

describe("recomputeSeries", () => {
  it("unions series and unit tags in first-seen order", () => {
    const series = makeSeries({ tags: ["Action"] });
    const units = [
      makeUnit({ id: "urn:mvn:unit:u1", tags: ["Action", "Drama"] }),
      makeUnit({ id: "urn:mvn:unit:u2", unitNumber: 2, tags: ["Comedy"] }),
    ];

    expect(recomputeSeries(series, units).tags).toEqual([
      "Action",
      "Drama",
      "Comedy",
    ]);
  });

  it("drops blank strings and keeps case-distinct values", () => {
    const series = makeSeries({ contentWarnings: ["Gore"] });
    const units = [makeUnit({ contentWarnings: ["", "  ", "gore", "Gore"] })];

    expect(recomputeSeries(series, units).contentWarnings).toEqual([
      "Gore",
      "gore",
    ]);
  });

  it("merges authors by id with later non-empty fields winning", () => {
    const series = makeSeries({ authors: [{ id: "a1", name: "Alice" }] });
    const units = [
      makeUnit({
        authors: [
          { id: "a1", name: "Alice R.", role: "artist" },
          { id: "a2", name: "Bob" },
        ],
      }),
    ];

    expect(recomputeSeries(series, units).authors).toEqual([
      { id: "a1", name: "Alice R.", role: "artist" },
      { id: "a2", name: "Bob" },
    ]);
  });

  it("rolls unit scanlators into per-language blocks and the top level", () => {
    const series = makeSeries();
    const units = [
      makeUnit({
        id: "urn:mvn:unit:u1",
        localized: { en: { scanlators: [groupOne] } },
      }),
      makeUnit({
        id: "urn:mvn:unit:u2",
        unitNumber: 2,
        localized: { es: { title: "Uno", scanlators: [groupTwo] } },
      }),
    ];

    const result = recomputeSeries(series, units);

    expect(result.localized).toEqual({
      en: { scanlators: [groupOne] },
      es: { scanlators: [groupTwo] },
    });
    expect(result.scanlators).toEqual([groupOne, groupTwo]);
  });

  it("keeps existing localized fields when merging scanlators", () => {
    const series = makeSeries({
      localized: { en: { title: "Harbor Lights (EN)", scanlators: [groupOne] } },
    });
    const units = [makeUnit({ localized: { en: { scanlators: [groupTwo] } } })];

    expect(recomputeSeries(series, units).localized).toEqual({
      en: { title: "Harbor Lights (EN)", scanlators: [groupOne, groupTwo] },
    });
  });

  it("is idempotent", () => {
    const series = makeSeries({ tags: ["Action"] });
    const units = [
      makeUnit({
        tags: ["Drama"],
        authors: [{ id: "a1", name: "Alice" }],
        localized: { en: { scanlators: [groupOne] } },
      }),
    ];

    const once = recomputeSeries(series, units);
    const twice = recomputeSeries(once, units);

    expect(JSON.stringify(twice)).toBe(JSON.stringify(once));
  });

  it("never removes series values when units go away", () => {
    const series = makeSeries({ tags: ["Action"] });
    const withUnit = recomputeSeries(series, [makeUnit({ tags: ["Drama"] })]);

    expect(recomputeSeries(withUnit, []).tags).toEqual(["Action", "Drama"]);
  });

  it("passes other fields through untouched", () => {
    const series = makeSeries({ title: "Keep Me", year: 2020 });
    const result = recomputeSeries(series, [makeUnit({ tags: ["Drama"] })]);

    expect(result.title).toBe("Keep Me");
    expect(result.year).toBe(2020);
    expect(result.updatedAt).toBe(series.updatedAt);
    expect(result.allowedEditors).toEqual([]);
  });
});

describe("inheritFromSeries", () => {
  const series = makeSeries({
    tags: ["Action"],
    contentWarnings: ["Gore"],
    authors: [{ id: "a1", name: "Alice" }],
    localized: { en: { scanlators: [groupOne] } },
  });

  it("fills unset fields from the series", () => {
    const result = inheritFromSeries(makeUnit(), series);

    expect(result.tags).toEqual(["Action"]);
    expect(result.contentWarnings).toEqual(["Gore"]);
    expect(result.authors).toEqual([{ id: "a1", name: "Alice" }]);
    expect(result.localized).toBeUndefined();
  });

  it("keeps unit overrides, including empty ones", () => {
    const result = inheritFromSeries(makeUnit({ tags: [] }), series);

    expect(result.tags).toEqual([]);
    expect(result.contentWarnings).toEqual(["Gore"]);
  });

  it("borrows the requested language's series scanlators", () => {
    expect(inheritFromSeries(makeUnit(), series, "en").localized).toEqual({
      en: { scanlators: [groupOne] },
    });
    expect(inheritFromSeries(makeUnit(), series, "fr").localized).toBeUndefined();
  });

  it("leaves a unit's own localized block alone", () => {
    const unit = makeUnit({ localized: { en: { scanlators: [groupTwo] } } });

    expect(inheritFromSeries(unit, series, "en").localized).toEqual({
      en: { scanlators: [groupTwo] },
    });
  });
});

describe("TaxonomyAggregator", () => {
  it("delegates to the pure functions", () => {
    const aggregator = new TaxonomyAggregator();
    const series = makeSeries({ tags: ["Action"] });
    const units = [makeUnit({ tags: ["Drama"] })];

    expect(aggregator.recompute(series, units)).toEqual(
      recomputeSeries(series, units)
    );
    expect(aggregator.inherit(units[0], series)).toEqual(
      inheritFromSeries(units[0], series)
    );
  });
});
