/**
 * Schema families, one per asset class.
 *
 * Each family lists its canonical fields with a zod schema and whether the
 * field is required. Checks that span several fields, and values derived from
 * them, are declared alongside.
 */

import { createHash } from "crypto";
import { z } from "zod";
import { ALLOWED_ARTIFACT_MIME_TYPES, IMAGE_MIME_TYPES } from "../constants.js";
import type { AssetClass, FieldDefect } from "../types.js";

export interface FieldSpec {
  schema: z.ZodTypeAny;
  required: boolean;
}

export interface FamilyContext {
  gridSize: number;
}

export interface SchemaFamily {
  fields: Record<string, FieldSpec>;
  /** Cross-field rules; only sees fields that passed their own schema */
  check?: (fields: Record<string, unknown>) => FieldDefect[];
  derive?: (fields: Record<string, unknown>, ctx: FamilyContext) => Record<string, unknown>;
}

const text = z.string();
const nonEmptyText = z.string().min(1);
const uri = z.string().min(1).max(8192);
const stringList = z.array(z.string());
const coordinate = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);

const attribute = z
  .object({
    trait_type: z.string().optional(),
    value: z.union([z.string(), z.number(), z.boolean()]),
  })
  .passthrough();

const format = z
  .object({
    uri: uri,
    mimeType: nonEmptyText,
    fileSize: z.number().int().nonnegative().optional(),
    dimensions: z.object({ value: z.string(), unit: z.string() }).passthrough().optional(),
  })
  .passthrough();

type Format = z.infer<typeof format>;

const required = (schema: z.ZodTypeAny): FieldSpec => ({ schema, required: true });
const optional = (schema: z.ZodTypeAny): FieldSpec => ({ schema, required: false });

/**
 * Split tags on commas as well, producers pack several tags in one string.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const result: string[] = [];
  for (const tag of tags) {
    for (const part of tag.split(",")) {
      const stripped = part.trim();
      if (stripped.length > 0) {
        result.push(stripped.toLowerCase());
      }
    }
  }
  return result;
}

function toGrid(coordinate: number, gridSize: number): number {
  const sign = coordinate < 0 ? -1 : 1;
  return Math.trunc(coordinate / gridSize) + sign;
}

/**
 * Hash of the grid cell containing a point, used to look up neighbouring places.
 */
export function gridCellHash(x: number, y: number, z: number, gridSize: number): string {
  return createHash("sha1")
    .update(`${toGrid(x, gridSize)}-${toGrid(y, gridSize)}-${toGrid(z, gridSize)}`)
    .digest("hex");
}

function deriveTags(fields: Record<string, unknown>): Record<string, unknown> {
  const parsed = stringList.safeParse(fields.tags);
  return parsed.success ? { tags: normalizeTags(parsed.data) } : {};
}

/**
 * Parse "<width>x<height>" pixel dimensions.
 */
function parseDimensions(dimensions: NonNullable<Format["dimensions"]>): { width: number; height: number } | string {
  if (dimensions.unit !== "px") {
    return `dimensions not in pixels: ${dimensions.unit}`;
  }
  const values = dimensions.value.split("x");
  if (values.length !== 2 || !values.every((v) => /^\d+$/.test(v))) {
    return `dimensions must look like <width>x<height>: ${dimensions.value}`;
  }
  return { width: parseInt(values[0], 10), height: parseInt(values[1], 10) };
}

function findArtifactFormat(fields: Record<string, unknown>): Format | undefined {
  const formats = z.array(format).safeParse(fields.formats);
  if (!formats.success || typeof fields.artifactUri !== "string") return undefined;
  return formats.data.find((f) => f.uri === fields.artifactUri);
}

function checkItem(fields: Record<string, unknown>): FieldDefect[] {
  if (fields.formats === undefined || fields.artifactUri === undefined) {
    return [];
  }

  const artifact = findArtifactFormat(fields);
  if (!artifact) {
    return [{ field: "formats", problem: "inconsistent", message: "formats do not include artifactUri" }];
  }

  const defects: FieldDefect[] = [];
  if (!ALLOWED_ARTIFACT_MIME_TYPES.includes(artifact.mimeType)) {
    defects.push({ field: "formats", problem: "inconsistent", message: `unsupported mime type: ${artifact.mimeType}` });
  }
  if (artifact.fileSize === undefined) {
    defects.push({ field: "formats", problem: "inconsistent", message: "artifact format has no fileSize" });
  }

  let hasDimensions = false;
  if (artifact.dimensions) {
    const parsed = parseDimensions(artifact.dimensions);
    if (typeof parsed === "string") {
      defects.push({ field: "formats", problem: "inconsistent", message: parsed });
    } else {
      hasDimensions = true;
    }
  }

  if (IMAGE_MIME_TYPES.some((type) => type === artifact.mimeType)) {
    if (!hasDimensions) {
      defects.push({ field: "formats", problem: "inconsistent", message: "image artifact has no pixel dimensions" });
    }
    if (fields.imageFrame === undefined) {
      defects.push({ field: "imageFrame", problem: "missing", message: "required for image artifacts" });
    }
  }

  return defects;
}

function deriveItem(fields: Record<string, unknown>): Record<string, unknown> {
  const derived: Record<string, unknown> = deriveTags(fields);
  const artifact = findArtifactFormat(fields);
  if (artifact) {
    derived.mimeType = artifact.mimeType;
    if (artifact.fileSize !== undefined) derived.fileSize = artifact.fileSize;
    if (artifact.dimensions) {
      const parsed = parseDimensions(artifact.dimensions);
      if (typeof parsed !== "string") {
        derived.width = parsed.width;
        derived.height = parsed.height;
      }
    }
  }
  return derived;
}

function derivePlace(fields: Record<string, unknown>, ctx: FamilyContext): Record<string, unknown> {
  const center = coordinate.safeParse(fields.centerCoordinates);
  if (!center.success) return {};
  const [x, y, z] = center.data;
  return { gridHash: gridCellHash(x, y, z, ctx.gridSize) };
}

export const SCHEMA_FAMILIES: Record<AssetClass, SchemaFamily> = {
  // Generic NFT metadata (ERC-721 / TZIP-21 style)
  token: {
    fields: {
      name: required(nonEmptyText),
      description: optional(text),
      symbol: optional(text),
      decimals: optional(z.number().int().nonnegative()),
      image: optional(uri),
      animation_url: optional(uri),
      external_url: optional(uri),
      artifactUri: optional(uri),
      displayUri: optional(uri),
      thumbnailUri: optional(uri),
      creators: optional(stringList),
      attributes: optional(z.array(attribute)),
      formats: optional(z.array(format)),
      tags: optional(stringList),
    },
    derive: deriveTags,
  },

  // Fungible token metadata: decimals is the format marker
  fungible: {
    fields: {
      name: required(nonEmptyText),
      symbol: required(nonEmptyText),
      decimals: required(z.number().int().min(0).max(255)),
      description: optional(text),
      image: optional(uri),
      thumbnailUri: optional(uri),
      shouldPreferSymbol: optional(z.boolean()),
    },
  },

  // 3D item: artifact must be described by one of its formats
  item: {
    fields: {
      name: optional(text),
      description: optional(text),
      artifactUri: required(uri),
      formats: required(z.array(format).min(1)),
      polygonCount: required(z.number().int().nonnegative()),
      baseScale: required(z.number().positive()),
      tags: required(stringList),
      thumbnailUri: optional(uri),
      displayUri: optional(uri),
      imageFrame: optional(z.record(z.unknown())),
    },
    check: checkItem,
    derive: deriveItem,
  },

  // Land parcel
  place: {
    fields: {
      name: optional(text),
      description: optional(text),
      placeType: required(nonEmptyText),
      borderCoordinates: required(z.array(coordinate).min(3)),
      centerCoordinates: required(coordinate),
      buildHeight: required(z.number().nonnegative()),
    },
    derive: derivePlace,
  },

  // Contract-level metadata
  collection: {
    fields: {
      name: required(nonEmptyText),
      description: required(text),
      userDescription: optional(text),
      tags: optional(stringList),
    },
    derive: deriveTags,
  },
};
