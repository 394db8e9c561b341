/**
 * Fetcher - resolves a metadata source to raw bytes.
 *
 * Content-addressed URIs go through an ordered gateway list (independent
 * timeout per gateway, next gateway on failure). HTTP(S) URIs are fetched
 * directly with SSRF checks (literal host and resolved addresses) and manual
 * redirect handling. Every body read is capped at `maxBytes` and cancelled as
 * soon as the cap is exceeded.
 */

import { lookup } from "dns/promises";
import type { LookupAddress } from "dns";
import { FetchError } from "../errors.js";
import type { FetchErrorKind } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { MAX_REDIRECT_DEPTH, USER_AGENT } from "../constants.js";
import { canonicalizeIP, isBlockedHost, isPrivateIP } from "../utils/host-guard.js";
import { classifyUri, targetKey } from "./uri.js";
import type { ContentScheme } from "./uri.js";
import type { GatewayConfig, MetadataSource, RawPayload } from "../types.js";

const logger = createChildLogger("fetcher");

export interface FetcherOptions {
  ipfsGateways: GatewayConfig[];
  arweaveGateways: GatewayConfig[];
  httpTimeoutMs: number;
  maxBytes: number;
  allowPrivateHosts?: boolean;
  userAgent?: string;
}

export interface ResolveOptions {
  /** Byte cap for this call, defaults to the fetcher's maxBytes */
  maxBytes?: number;
}

type DownloadResult =
  | { kind: "body"; bytes: Uint8Array; contentType: string | null }
  | { kind: "redirect"; location: string; status: number };

export class Fetcher {
  private readonly options: FetcherOptions;

  constructor(options: FetcherOptions) {
    this.options = options;
  }

  /**
   * Resolve a metadata source to raw bytes.
   * Throws FetchError; `retryable` tells the caller whether to try again later.
   */
  async resolve(source: MetadataSource, options: ResolveOptions = {}): Promise<RawPayload> {
    const maxBytes = options.maxBytes ?? this.options.maxBytes;

    if (source.kind === "inline") {
      assertWithinCap(source.bytes.length, maxBytes);
      return {
        bytes: source.bytes,
        sourceUri: null,
        gateway: "inline",
        contentType: null,
        fetchedAt: new Date(),
      };
    }

    const target = classifyUri(source.uri);

    switch (target.kind) {
      case "data":
        assertWithinCap(target.bytes.length, maxBytes);
        return {
          bytes: target.bytes,
          sourceUri: source.uri,
          gateway: "inline",
          contentType: target.contentType,
          fetchedAt: new Date(),
        };

      case "content-addressed":
        return this.fetchFromGateways(source.uri, target.scheme, target.path, maxBytes);

      case "http":
        return this.fetchDirect(source.uri, target.url, 0, maxBytes);
    }
  }

  /**
   * Key under which concurrent resolutions of the same content can be joined.
   * Null when the source needs no I/O or cannot be classified.
   */
  sourceKey(source: MetadataSource): string | null {
    if (source.kind === "inline") return null;
    try {
      return targetKey(classifyUri(source.uri));
    } catch {
      // Malformed URIs fail fast in resolve(); nothing to coalesce
      return null;
    }
  }

  private gatewaysFor(scheme: ContentScheme): GatewayConfig[] {
    return scheme === "ipfs" ? this.options.ipfsGateways : this.options.arweaveGateways;
  }

  private async fetchFromGateways(
    uri: string,
    scheme: ContentScheme,
    path: string,
    maxBytes: number
  ): Promise<RawPayload> {
    const gateways = this.gatewaysFor(scheme);
    const failures: Array<{ gateway: string; kind: FetchErrorKind; message: string }> = [];

    for (const gateway of gateways) {
      const url = scheme === "ipfs" ? `${gateway.baseUrl}/ipfs/${path}` : `${gateway.baseUrl}/${path}`;

      try {
        const result = await this.download(url, gateway.timeoutMs, "follow", maxBytes);
        if (result.kind === "redirect") {
          throw new FetchError("rejected", `Unexpected redirect ${result.status}`, { status: result.status });
        }

        if (failures.length > 0) {
          logger.info({ uri, gateway: gateway.baseUrl, failedGateways: failures.length }, "Resolved via fallback gateway");
        }
        return {
          bytes: result.bytes,
          sourceUri: uri,
          gateway: gateway.baseUrl,
          contentType: result.contentType,
          fetchedAt: new Date(),
        };
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        // Size is a property of the content, every gateway would serve the same bytes
        if (error.kind === "too_large") {
          throw error;
        }
        failures.push({ gateway: gateway.baseUrl, kind: error.kind, message: error.message });
        logger.warn({ uri, gateway: gateway.baseUrl, kind: error.kind, error: error.message }, "Gateway fetch failed");
      }
    }

    throw new FetchError(
      "gateway_exhausted",
      `All ${gateways.length} ${scheme} gateways failed for ${uri}: ` +
        failures.map((f) => `${f.gateway} (${f.kind})`).join(", ")
    );
  }

  private async fetchDirect(uri: string, url: URL, redirectDepth: number, maxBytes: number): Promise<RawPayload> {
    if (!this.options.allowPrivateHosts) {
      await assertPublicHost(uri, url.hostname);
    }

    if (url.protocol === "http:") {
      logger.debug({ uri }, "HTTP URI used (insecure)");
    }

    const result = await this.download(url.toString(), this.options.httpTimeoutMs, "manual", maxBytes);

    if (result.kind === "redirect") {
      if (redirectDepth >= MAX_REDIRECT_DEPTH) {
        throw new FetchError("rejected", "Too many redirects");
      }

      let next: URL;
      try {
        next = new URL(result.location, url);
      } catch (error) {
        throw new FetchError("malformed_uri", `Invalid redirect location: ${result.location}`, { cause: error });
      }
      if (next.protocol !== "https:" && next.protocol !== "http:") {
        throw new FetchError("unsupported_scheme", `Redirect to unsupported scheme '${next.protocol}'`);
      }
      return this.fetchDirect(uri, next, redirectDepth + 1, maxBytes);
    }

    return {
      bytes: result.bytes,
      sourceUri: uri,
      gateway: "direct",
      contentType: result.contentType,
      fetchedAt: new Date(),
    };
  }

  /**
   * Single HTTP GET with a deadline covering headers and body.
   */
  private async download(
    url: string,
    timeoutMs: number,
    redirect: "follow" | "manual",
    maxBytes: number
  ): Promise<DownloadResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
          redirect,
          headers: {
            Accept: "application/json, */*;q=0.5",
            "User-Agent": this.options.userAgent ?? USER_AGENT,
          },
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new FetchError("timeout", `Timed out after ${timeoutMs}ms: ${url}`, { cause: error });
        }
        throw new FetchError("unavailable", `Request failed: ${url}: ${errorMessage(error)}`, { cause: error });
      }

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        if (!location) {
          throw new FetchError("rejected", `Redirect ${response.status} without location`, { status: response.status });
        }
        return { kind: "redirect", location, status: response.status };
      }

      if (!response.ok) {
        throw httpStatusError(response.status, url);
      }

      const contentLength = response.headers.get("content-length");
      if (contentLength && parseInt(contentLength, 10) > maxBytes) {
        await response.body?.cancel();
        throw new FetchError("too_large", `Content-Length ${contentLength} exceeds ${maxBytes}`);
      }

      const reader = response.body?.getReader();
      if (!reader) {
        return { kind: "body", bytes: new Uint8Array(0), contentType: response.headers.get("content-type") };
      }

      const chunks: Uint8Array[] = [];
      let totalBytes = 0;

      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;

          totalBytes += value.length;
          if (totalBytes > maxBytes) {
            await reader.cancel();
            throw new FetchError("too_large", `Body exceeds ${maxBytes} bytes`);
          }
          chunks.push(value);
        }
      } catch (error) {
        if (error instanceof FetchError) throw error;
        if (controller.signal.aborted) {
          throw new FetchError("timeout", `Timed out reading body after ${timeoutMs}ms: ${url}`, { cause: error });
        }
        throw new FetchError("unavailable", `Body read failed: ${url}: ${errorMessage(error)}`, { cause: error });
      }

      return { kind: "body", bytes: Buffer.concat(chunks), contentType: response.headers.get("content-type") };
    } finally {
      // Always clear timeout to prevent resource leak
      clearTimeout(timeoutId);
    }
  }
}

function assertWithinCap(bytes: number, maxBytes: number): void {
  if (bytes > maxBytes) {
    throw new FetchError("too_large", `Payload of ${bytes} bytes exceeds ${maxBytes}`);
  }
}

/**
 * Reject hosts that are internal by name or literal address, then resolve the
 * name and reject it if any address is internal. Checked again on every redirect.
 */
async function assertPublicHost(uri: string, hostname: string): Promise<void> {
  if (isBlockedHost(hostname)) {
    logger.warn({ uri, hostname }, "Blocked SSRF attempt");
    throw new FetchError("blocked", `Internal host blocked: ${hostname}`);
  }

  const bare = hostname.replace(/^\[|\]$/g, "");
  if (canonicalizeIP(bare)) return;

  let records: LookupAddress[];
  try {
    records = await lookup(bare, { all: true });
  } catch (error) {
    throw new FetchError("unavailable", `DNS lookup failed for ${bare}: ${errorMessage(error)}`, { cause: error });
  }

  const internal = records.find((record) => isPrivateIP(record.address));
  if (internal) {
    logger.warn({ uri, hostname: bare, ip: internal.address }, "DNS resolved to private IP");
    throw new FetchError("blocked", `Host ${bare} resolves to internal address ${internal.address}`);
  }
}

function httpStatusError(status: number, url: string): FetchError {
  if (status === 404 || status === 410) {
    return new FetchError("not_found", `HTTP ${status}: ${url}`, { status });
  }
  if (status === 429 || status >= 500) {
    return new FetchError("unavailable", `HTTP ${status}: ${url}`, { status });
  }
  return new FetchError("rejected", `HTTP ${status}: ${url}`, { status });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
