/**
 * Validator - turns raw payload bytes into a ValidatedDocument.
 *
 * Never throws: unparseable input becomes `invalid`, missing or malformed
 * fields become defects of a `partially_valid` document. Output depends only
 * on the bytes, the asset class and the grid size.
 */

import { VALIDATION_RULESET_VERSION } from "../constants.js";
import { fingerprintOf } from "./fingerprint.js";
import { SCHEMA_FAMILIES } from "./schemas.js";
import type { AssetClass, FieldDefect, InvalidReason, RawPayload, ValidatedDocument } from "../types.js";

export interface ValidatorOptions {
  gridSize: number;
}

type ParseResult =
  | { ok: true; document: Record<string, unknown> }
  | { ok: false; reason: InvalidReason; detail: string };

function describeJsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseDocument(bytes: Uint8Array): ParseResult {
  let text: string;
  try {
    // fatal: reject invalid UTF-8 instead of substituting U+FFFD
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return { ok: false, reason: "parse_error", detail: "payload is not valid UTF-8" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      reason: "parse_error",
      detail: error instanceof Error ? error.message : "invalid JSON",
    };
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, reason: "not_an_object", detail: `expected a JSON object, got ${describeJsonType(parsed)}` };
  }
  return { ok: true, document: parsed };
}

export class Validator {
  private readonly options: ValidatorOptions;

  constructor(options: ValidatorOptions) {
    this.options = options;
  }

  schemaVersion(assetClass: AssetClass): string {
    return `${assetClass}@${VALIDATION_RULESET_VERSION}`;
  }

  validate(payload: RawPayload, assetClass: AssetClass): ValidatedDocument {
    const base = {
      fingerprint: fingerprintOf(payload.bytes),
      schemaVersion: this.schemaVersion(assetClass),
      assetClass,
      byteLength: payload.bytes.length,
    };

    const parsed = parseDocument(payload.bytes);
    if (!parsed.ok) {
      return {
        ...base,
        fields: {},
        derived: {},
        extensions: {},
        validity: { status: "invalid", reason: parsed.reason, detail: parsed.detail },
      };
    }

    const family = SCHEMA_FAMILIES[assetClass];
    const document = parsed.document;
    const defects: FieldDefect[] = [];
    const fields: Array<[string, unknown]> = [];

    for (const [key, spec] of Object.entries(family.fields)) {
      const value = Object.hasOwn(document, key) ? document[key] : undefined;

      // Producers write null for "not set"
      if (value === undefined || value === null) {
        if (spec.required) {
          defects.push({ field: key, problem: "missing" });
        }
        continue;
      }

      const result = spec.schema.safeParse(value);
      if (!result.success) {
        defects.push({ field: key, problem: "malformed", message: result.error.issues[0]?.message ?? "invalid value" });
        continue;
      }
      fields.push([key, value]);
    }

    // Object.fromEntries defines own properties, so "__proto__" keys stay data
    const canonical = Object.fromEntries(fields);
    const extensions = Object.fromEntries(
      Object.entries(document).filter(([key]) => !Object.hasOwn(family.fields, key))
    );

    if (family.check) {
      defects.push(...family.check(canonical));
    }
    const derived = family.derive ? family.derive(canonical, { gridSize: this.options.gridSize }) : {};

    return {
      ...base,
      fields: canonical,
      derived,
      extensions,
      validity: defects.length > 0 ? { status: "partially_valid", defects } : { status: "valid" },
    };
  }
}
