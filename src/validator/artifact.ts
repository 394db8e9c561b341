/**
 * Artifact verification for `item` documents.
 *
 * Downloads the file named by `artifactUri` under its own byte cap and checks
 * it against the artifact's format entry: the size must equal `fileSize`, and
 * a glTF model may not have more polygons than `polygonCount` declares beyond
 * the configured tolerance. Mismatches become defects of the document.
 * Retryable fetch failures are thrown so the event is tried again.
 */

import { FetchError } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { ALLOWED_ARTIFACT_MIME_TYPES, GLTF_MIME_TYPES } from "../constants.js";
import { countPolygons, GltfError } from "./gltf.js";
import type { Fetcher } from "../fetcher/fetcher.js";
import type { FieldDefect, RawPayload, ValidatedDocument } from "../types.js";

const logger = createChildLogger("artifact");

export interface ArtifactVerifierOptions {
  fetcher: Pick<Fetcher, "resolve">;
  maxBytes: number;
  /** Allowed excess of counted over declared polygons, in basis points of the declared count */
  polygonToleranceBps: number;
}

export class ArtifactVerifier {
  private readonly options: ArtifactVerifierOptions;

  constructor(options: ArtifactVerifierOptions) {
    this.options = options;
  }

  async verify(document: ValidatedDocument): Promise<ValidatedDocument> {
    if (document.assetClass !== "item" || document.validity.status === "invalid") {
      return document;
    }

    const artifactUri = document.fields.artifactUri;
    const mimeType = document.derived.mimeType;
    // No artifact format to check against; the schema already reported why
    if (
      typeof artifactUri !== "string" ||
      typeof mimeType !== "string" ||
      !ALLOWED_ARTIFACT_MIME_TYPES.includes(mimeType)
    ) {
      return document;
    }

    let payload: RawPayload;
    try {
      payload = await this.options.fetcher.resolve({ kind: "uri", uri: artifactUri }, { maxBytes: this.options.maxBytes });
    } catch (error) {
      // Oversize is a property of the file, retrying cannot change it
      if (error instanceof FetchError && (!error.retryable || error.kind === "too_large")) {
        logger.warn({ artifactUri, kind: error.kind, error: error.message }, "Artifact could not be fetched");
        return withDefects(document, [
          { field: "artifactUri", problem: "inconsistent", message: `artifact not retrievable: ${error.message}` },
        ]);
      }
      throw error;
    }

    const defects: FieldDefect[] = [];
    const derived: Record<string, unknown> = { artifactSize: payload.bytes.length };

    const declaredSize = document.derived.fileSize;
    if (typeof declaredSize === "number" && payload.bytes.length !== declaredSize) {
      defects.push({
        field: "formats",
        problem: "inconsistent",
        message: `artifact is ${payload.bytes.length} bytes, fileSize says ${declaredSize}`,
      });
    }

    let counted = 0;
    if (GLTF_MIME_TYPES.some((type) => type === mimeType)) {
      try {
        counted = countPolygons(payload.bytes);
        derived.countedPolygons = counted;
      } catch (error) {
        if (!(error instanceof GltfError)) throw error;
        defects.push({ field: "artifactUri", problem: "inconsistent", message: `unreadable glTF: ${error.message}` });
        return withDefects(document, defects, derived);
      }
    }

    const declared = document.fields.polygonCount;
    if (typeof declared === "number") {
      const excess = counted - declared;
      const allowed = (declared * this.options.polygonToleranceBps) / 10000;
      if (excess > allowed) {
        defects.push({
          field: "polygonCount",
          problem: "inconsistent",
          message: `model has ${counted} polygons, polygonCount says ${declared}`,
        });
      } else if (excess > 0) {
        logger.warn({ artifactUri, declared, counted, excess }, "Polygon count within tolerance but not exact");
      }
    }

    return withDefects(document, defects, derived);
  }
}

function withDefects(
  document: ValidatedDocument,
  defects: FieldDefect[],
  derived: Record<string, unknown> = {}
): ValidatedDocument {
  const merged = { ...document, derived: { ...document.derived, ...derived } };
  if (defects.length === 0) {
    return merged;
  }
  const existing = document.validity.status === "partially_valid" ? document.validity.defects : [];
  return { ...merged, validity: { status: "partially_valid", defects: [...existing, ...defects] } };
}
