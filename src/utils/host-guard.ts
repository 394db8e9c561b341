/**
 * SSRF protection for direct metadata fetches.
 * Metadata URIs are attacker-controlled: refuse anything that points at
 * loopback, link-local, private ranges or cloud metadata endpoints.
 */

const BLOCKED_HOSTS = new Set([
  "localhost",
  "0.0.0.0",
  "metadata.google.internal",
  "169.254.169.254", // AWS/GCP metadata
]);

const PRIVATE_IPV4_RANGES = [
  /^10\./,                         // 10.0.0.0/8
  /^172\.(1[6-9]|2[0-9]|3[01])\./, // 172.16.0.0/12
  /^192\.168\./,                   // 192.168.0.0/16
  /^169\.254\./,                   // Link-local
  /^127\./,                        // Loopback
  /^0\./,                          // Current network
  /^100\.(6[4-9]|[7-9][0-9]|1[01][0-9]|12[0-7])\./, // CGNAT 100.64.0.0/10
];

const PRIVATE_IPV6_RANGES = [
  /^f[cd][0-9a-f]{2}:/i, // Unique local (fc00::/7)
  /^fe[89ab][0-9a-f]:/i, // Link-local (fe80::/10)
];

function fromUint32(num: number): string {
  return `${(num >>> 24) & 0xff}.${(num >>> 16) & 0xff}.${(num >>> 8) & 0xff}.${num & 0xff}`;
}

/**
 * Expand an IPv6 literal to its eight 16-bit groups.
 * Returns null when the text is not an IPv6 address.
 */
function expandIPv6(address: string): number[] | null {
  let addr = address;
  const zone = addr.indexOf("%");
  if (zone !== -1) addr = addr.slice(0, zone);

  // Trailing dotted IPv4 (::ffff:127.0.0.1)
  const dotted = addr.match(/^(.*:)(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})$/);
  if (dotted) {
    const octets = dotted[2].split(".").map((o) => parseInt(o, 10));
    if (octets.some((o) => o > 255)) return null;
    addr = `${dotted[1]}${((octets[0] << 8) | octets[1]).toString(16)}:${((octets[2] << 8) | octets[3]).toString(16)}`;
  }

  const halves = addr.split("::");
  if (halves.length > 2) return null;

  const parse = (part: string): number[] | null => {
    if (part === "") return [];
    const groups: number[] = [];
    for (const group of part.split(":")) {
      if (!/^[0-9a-f]{1,4}$/i.test(group)) return null;
      groups.push(parseInt(group, 16));
    }
    return groups;
  };

  const left = parse(halves[0]);
  const right = halves.length === 2 ? parse(halves[1]) : [];
  if (!left || !right) return null;

  if (halves.length === 1) {
    return left.length === 8 ? left : null;
  }
  const fill = 8 - left.length - right.length;
  if (fill < 1) return null;
  return [...left, ...new Array<number>(fill).fill(0), ...right];
}

/**
 * Canonicalize an IP literal, including obfuscated IPv4 forms
 * (hex, single decimal, octal, IPv4-mapped IPv6).
 */
export function canonicalizeIP(ip: string): { ipv4: string } | { ipv6: number[] } | null {
  const lower = ip.toLowerCase();

  if (/^0x[0-9a-f]{1,8}$/.test(lower)) {
    return { ipv4: fromUint32(parseInt(lower, 16)) };
  }

  if (/^\d+$/.test(lower)) {
    const num = parseInt(lower, 10);
    return num <= 0xffffffff ? { ipv4: fromUint32(num) } : null;
  }

  if (/^[0-9x.]+$/.test(lower) && lower.split(".").length === 4) {
    const parts = lower.split(".").map((p) => {
      if (p.startsWith("0x")) return parseInt(p, 16);
      if (p.length > 1 && p.startsWith("0")) return parseInt(p, 8);
      return parseInt(p, 10);
    });
    if (parts.every((n) => !isNaN(n) && n >= 0 && n <= 255)) {
      return { ipv4: parts.join(".") };
    }
    return null;
  }

  if (lower.includes(":")) {
    const groups = expandIPv6(lower.replace(/^\[|\]$/g, ""));
    if (!groups) return null;
    // IPv4-mapped (::ffff:a.b.c.d) and IPv4-compatible (::a.b.c.d)
    const prefixZero = groups.slice(0, 5).every((g) => g === 0);
    if (prefixZero && (groups[5] === 0xffff || (groups[5] === 0 && groups[6] !== 0))) {
      return { ipv4: fromUint32(((groups[6] << 16) | groups[7]) >>> 0) };
    }
    return { ipv6: groups };
  }

  return null;
}

export function isPrivateIP(ip: string): boolean {
  const canonical = canonicalizeIP(ip);
  if (!canonical) return false;

  if ("ipv4" in canonical) {
    return BLOCKED_HOSTS.has(canonical.ipv4) || PRIVATE_IPV4_RANGES.some((range) => range.test(canonical.ipv4));
  }

  const groups = canonical.ipv6;
  const allZeroPrefix = groups.slice(0, 7).every((g) => g === 0);
  if (allZeroPrefix && (groups[7] === 0 || groups[7] === 1)) {
    return true; // :: and ::1
  }
  const text = groups.map((g) => g.toString(16).padStart(4, "0")).join(":");
  return PRIVATE_IPV6_RANGES.some((range) => range.test(text));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase().replace(/^\[|\]$/g, "");
  if (BLOCKED_HOSTS.has(lower) || lower.endsWith(".localhost")) return true;
  return isPrivateIP(lower);
}
