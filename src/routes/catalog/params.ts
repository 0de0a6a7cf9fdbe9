import { z } from "zod";
import {
  normalizeSeriesUrn,
  normalizeUnitUrn,
  normalizeUserUrn,
  unwrapUrn,
} from "../../utils/urn";

// Path segments take a bare id or a full URN; both resolve to the canonical URN.
export const seriesParamsSchema = z.object({
  seriesId: z.string().min(1),
});

export const unitParamsSchema = seriesParamsSchema.extend({
  unitId: z.string().min(1),
});

export const revokeParamsSchema = z.object({
  userUrn: z.string().min(1),
});

export const seriesUrnParam = (value: string) =>
  unwrapUrn(normalizeSeriesUrn(value));

export const unitUrnParam = (value: string) =>
  unwrapUrn(normalizeUnitUrn(value));

export const userUrnParam = (value: string) =>
  unwrapUrn(normalizeUserUrn(value));
