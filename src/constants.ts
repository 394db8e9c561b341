export const SERVICE_NAME = "nft-metadata-processor";
export const SERVICE_VERSION = "0.1.0";

export const USER_AGENT = `${SERVICE_NAME}/${SERVICE_VERSION} (${process.platform}; ${process.arch}) node/${process.versions.node}`;

// Bump when validation rules change so stored records can be re-derived
export const VALIDATION_RULESET_VERSION = 1;

export const GLTF_MIME_TYPES = ["model/gltf-binary", "model/gltf+json"] as const;
export const IMAGE_MIME_TYPES = ["image/png", "image/jpeg"] as const;
export const ALLOWED_ARTIFACT_MIME_TYPES: readonly string[] = [...GLTF_MIME_TYPES, ...IMAGE_MIME_TYPES];

export const MAX_REDIRECT_DEPTH = 5;

// Interval for periodic stats log lines
export const STATS_LOG_INTERVAL_MS = 60000;
