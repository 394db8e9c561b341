/**
 * Metadata URI classification.
 * Decides whether a URI is resolved locally (data:), through content-addressed
 * gateways (ipfs://, ar://, gateway-style /ipfs/ paths) or fetched directly.
 */

import { FetchError } from "../errors.js";

export type ContentScheme = "ipfs" | "ar";

export type UriTarget =
  | { kind: "data"; bytes: Uint8Array; contentType: string }
  | { kind: "content-addressed"; scheme: ContentScheme; path: string }
  | { kind: "http"; url: URL };

const IPFS_PREFIX = "ipfs://";
const ARWEAVE_PREFIX = "ar://";

// CIDv0 (base58btc multihash) or CIDv1 in the common multibase encodings
const CID_PATTERN = /^(Qm[1-9A-HJ-NP-Za-km-z]{44}|b[a-z2-7]{50,}|B[A-Z2-7]{50,}|z[1-9A-HJ-NP-Za-km-z]{40,}|f[0-9a-f]{50,})$/;
const ARWEAVE_ID_PATTERN = /^[a-zA-Z0-9_-]{43}$/;

export function isValidCid(cid: string): boolean {
  return CID_PATTERN.test(cid);
}

/**
 * Re-encode each path segment so that half-encoded paths
 * ("my%20file name.json") resolve the same way on every gateway.
 */
export function repairPath(path: string): string {
  return path
    .split("/")
    .map((segment) => {
      let decoded = segment;
      try {
        decoded = decodeURIComponent(segment);
      } catch {
        // Stray '%' - encode the segment as-is
      }
      return encodeURIComponent(decoded);
    })
    .join("/");
}

function contentAddressed(scheme: ContentScheme, rest: string, original: string): UriTarget {
  const [rawId, ...segments] = rest.split(/[?#]/)[0].split("/");
  const id = rawId.trim();

  if (scheme === "ipfs" && !isValidCid(id)) {
    throw new FetchError("malformed_uri", `Invalid CID in ${original}`);
  }
  if (scheme === "ar" && !ARWEAVE_ID_PATTERN.test(id)) {
    throw new FetchError("malformed_uri", `Invalid Arweave transaction id in ${original}`);
  }

  const subPath = segments.filter((segment) => segment.length > 0).join("/");
  return {
    kind: "content-addressed",
    scheme,
    path: subPath ? `${id}/${repairPath(subPath)}` : id,
  };
}

function parseDataUri(uri: string): UriTarget {
  const comma = uri.indexOf(",");
  if (comma === -1) {
    throw new FetchError("malformed_uri", "data: URI without payload separator");
  }

  const meta = uri.slice("data:".length, comma);
  const payload = uri.slice(comma + 1);
  const params = meta.split(";");
  const isBase64 = params[params.length - 1]?.toLowerCase() === "base64";
  const contentType = params[0] || "text/plain";

  if (isBase64) {
    if (!/^[A-Za-z0-9+/=_-]*$/.test(payload.replace(/\s/g, ""))) {
      throw new FetchError("malformed_uri", "data: URI has invalid base64 payload");
    }
    return { kind: "data", bytes: Buffer.from(payload, "base64"), contentType };
  }

  try {
    return { kind: "data", bytes: Buffer.from(decodeURIComponent(payload), "utf-8"), contentType };
  } catch (error) {
    throw new FetchError("malformed_uri", "data: URI has invalid percent-encoding", { cause: error });
  }
}

export function classifyUri(rawUri: string): UriTarget {
  const uri = rawUri.trim();
  if (!uri) {
    throw new FetchError("malformed_uri", "Empty URI");
  }

  const lower = uri.toLowerCase();

  if (lower.startsWith("data:")) {
    return parseDataUri(uri);
  }

  if (lower.startsWith(IPFS_PREFIX)) {
    // Some producers write ipfs://ipfs/<cid>
    const rest = uri.slice(IPFS_PREFIX.length).replace(/^ipfs\//i, "");
    return contentAddressed("ipfs", rest, uri);
  }

  if (uri.startsWith("/ipfs/")) {
    return contentAddressed("ipfs", uri.slice("/ipfs/".length), uri);
  }

  if (lower.startsWith(ARWEAVE_PREFIX)) {
    return contentAddressed("ar", uri.slice(ARWEAVE_PREFIX.length), uri);
  }

  if (lower.startsWith("https://") || lower.startsWith("http://")) {
    let url: URL;
    try {
      url = new URL(uri);
    } catch (error) {
      throw new FetchError("malformed_uri", `Invalid URL: ${uri}`, { cause: error });
    }

    // Pinned to one gateway by the producer; resolve through ours instead
    const gatewayPath = url.pathname.match(/^\/ipfs\/([^/]+)(\/.*)?$/);
    if (gatewayPath && isValidCid(gatewayPath[1])) {
      return contentAddressed("ipfs", url.pathname.slice("/ipfs/".length), uri);
    }

    return { kind: "http", url };
  }

  const scheme = uri.match(/^([a-z][a-z0-9+.-]*):/i);
  if (scheme) {
    throw new FetchError("unsupported_scheme", `Unsupported URI scheme '${scheme[1]}'`);
  }
  throw new FetchError("malformed_uri", `Not a URI: ${uri}`);
}

/**
 * Stable identity of what a URI resolves to, used to coalesce
 * concurrent fetches of the same content.
 */
export function targetKey(target: UriTarget): string | null {
  switch (target.kind) {
    case "content-addressed":
      return `${target.scheme}://${target.path}`;
    case "http":
      return target.url.href;
    case "data":
      return null;
  }
}
