import { z } from "zod";
import { isValidUrn, type MvnType } from "../utils/urn";

const urnOf = (type: MvnType) =>
  z.string().refine((value) => isValidUrn(value, type), {
    message: `Must be a valid ${type} URN`,
  });

export const seriesUrnSchema = urnOf("series");
export const unitUrnSchema = urnOf("unit");
export const userUrnSchema = urnOf("user");

export const languageCodeSchema = z
  .string()
  .regex(/^[a-z]{2}$/, "Language code must be lowercase ISO 639-1");

export const authorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  role: z.string().optional(),
});

export const scanlatorRoleSchema = z.enum(["translation", "scanlation", "both"]);

export const scanlatorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  role: scanlatorRoleSchema,
});

export const groupSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  website: z.string().url().optional(),
  discord: z.string().url().optional(),
});

export const posterSchema = z.object({
  url: z.string().url(),
  altText: z.string(),
});

export const localizedMetadataSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  altTitles: z.array(z.string()).optional(),
  scanlators: z.array(scanlatorSchema).optional(),
  contentFolder: z.string().optional(),
  poster: posterSchema.optional(),
});

export const unitLocalizedMetadataSchema = z.object({
  title: z.string().optional(),
  scanlators: z.array(scanlatorSchema).optional(),
  contentFolder: z.string().optional(),
});

export const seriesSchema = z.object({
  id: seriesUrnSchema,
  federationRef: z.string().optional(),
  title: z.string().min(1).max(500),
  description: z.string().max(5000),
  poster: posterSchema.optional(),
  mediaType: z.string().min(1),
  readingDirection: z.string().optional(),
  externalLinks: z.record(z.string(), z.string()),
  tags: z.array(z.string()),
  contentWarnings: z.array(z.string()),
  authors: z.array(authorSchema),
  scanlators: z.array(scanlatorSchema),
  groups: z.array(groupSchema),
  altTitles: z.array(z.string()),
  status: z.string().optional(),
  year: z.number().int().optional(),
  originalLanguage: languageCodeSchema.optional(),
  createdBy: userUrnSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  localized: z.record(languageCodeSchema, localizedMetadataSchema),
  allowedEditors: z.array(userUrnSchema),
});

export const unitSchema = z.object({
  id: unitUrnSchema,
  seriesId: seriesUrnSchema,
  unitNumber: z.number().nonnegative(),
  title: z.string(),
  language: languageCodeSchema.optional(),
  pageCount: z.number().int().nonnegative(),
  folderPath: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  contentWarnings: z.array(z.string()).optional(),
  authors: z.array(authorSchema).optional(),
  localized: z
    .record(languageCodeSchema, unitLocalizedMetadataSchema)
    .optional(),
  allowedEditors: z.array(userUrnSchema),
  createdBy: userUrnSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const editPermissionSchema = z.object({
  targetUrn: z.string(),
  userUrn: userUrnSchema,
  grantedBy: z.string(),
  grantedAt: z.string().datetime(),
});

export const createSeriesSchema = z.object({
  title: z.string().trim().min(1).max(500),
  mediaType: z.string().min(1),
  description: z.string().max(5000).optional(),
  federationRef: z.string().optional(),
  poster: posterSchema.optional(),
  readingDirection: z.string().optional(),
  externalLinks: z.record(z.string(), z.string().url()).optional(),
  tags: z.array(z.string()).optional(),
  contentWarnings: z.array(z.string()).optional(),
  authors: z.array(authorSchema).optional(),
  scanlators: z.array(scanlatorSchema).optional(),
  groups: z.array(groupSchema).optional(),
  altTitles: z.array(z.string()).optional(),
  status: z.string().optional(),
  year: z.number().int().min(1800).max(3000).optional(),
  originalLanguage: languageCodeSchema.optional(),
  localized: z.record(languageCodeSchema, localizedMetadataSchema).optional(),
});

export const updateSeriesSchema = createSeriesSchema
  .partial()
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided",
  });

export const createUnitSchema = z.object({
  unitNumber: z.number().nonnegative(),
  title: z.string().max(500).optional(),
  language: languageCodeSchema.optional(),
  description: z.string().max(5000).optional(),
  pageCount: z.number().int().nonnegative().optional(),
  folderPath: z.string().optional(),
  tags: z.array(z.string()).optional(),
  contentWarnings: z.array(z.string()).optional(),
  authors: z.array(authorSchema).optional(),
  localized: z
    .record(languageCodeSchema, unitLocalizedMetadataSchema)
    .optional(),
});

// null clears a unit-level override so the unit inherits the series value again.
export const updateUnitSchema = z
  .object({
    unitNumber: z.number().nonnegative().optional(),
    title: z.string().max(500).optional(),
    language: languageCodeSchema.optional(),
    description: z.string().max(5000).optional(),
    pageCount: z.number().int().nonnegative().optional(),
    folderPath: z.string().optional(),
    tags: z.array(z.string()).nullable().optional(),
    contentWarnings: z.array(z.string()).nullable().optional(),
    authors: z.array(authorSchema).nullable().optional(),
    localized: z
      .record(languageCodeSchema, unitLocalizedMetadataSchema)
      .nullable()
      .optional(),
  })
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided",
  });

export const grantPermissionSchema = z.object({
  userUrn: z.string().min(1),
});

export const transferOwnershipSchema = z.object({
  newOwnerUrn: z.string().min(1),
});

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
  cursor: z.string().optional(),
});

export type Author = z.infer<typeof authorSchema>;
export type Scanlator = z.infer<typeof scanlatorSchema>;
export type ScanlatorRole = z.infer<typeof scanlatorRoleSchema>;
export type Group = z.infer<typeof groupSchema>;
export type Poster = z.infer<typeof posterSchema>;
export type LocalizedMetadata = z.infer<typeof localizedMetadataSchema>;
export type UnitLocalizedMetadata = z.infer<typeof unitLocalizedMetadataSchema>;
export type Series = z.infer<typeof seriesSchema>;
export type Unit = z.infer<typeof unitSchema>;
export type EditPermission = z.infer<typeof editPermissionSchema>;
export type CreateSeriesInput = z.infer<typeof createSeriesSchema>;
export type UpdateSeriesInput = z.infer<typeof updateSeriesSchema>;
export type CreateUnitInput = z.infer<typeof createUnitSchema>;
export type UpdateUnitInput = z.infer<typeof updateUnitSchema>;
