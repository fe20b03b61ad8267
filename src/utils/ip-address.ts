import { BlockList, isIP } from 'node:net';

type IpSegment = number | string;
type IpFamily = 'ipv4' | 'ipv6';

export function buildIpv4(
  parts: readonly [number, number, number, number]
): string {
  return parts.join('.');
}

export function buildIpv6(parts: readonly IpSegment[]): string {
  return parts.map(String).join(':');
}

type BlockedSubnet = Readonly<{
  subnet: string;
  prefix: number;
  family: IpFamily;
}>;

const IPV6_MAPPED_PREFIX = '::ffff:';

const BLOCKED_SUBNETS: readonly BlockedSubnet[] = [
  { subnet: buildIpv4([0, 0, 0, 0]), prefix: 8, family: 'ipv4' },
  { subnet: buildIpv4([10, 0, 0, 0]), prefix: 8, family: 'ipv4' },
  { subnet: buildIpv4([100, 64, 0, 0]), prefix: 10, family: 'ipv4' },
  { subnet: buildIpv4([127, 0, 0, 0]), prefix: 8, family: 'ipv4' },
  { subnet: buildIpv4([169, 254, 0, 0]), prefix: 16, family: 'ipv4' },
  { subnet: buildIpv4([172, 16, 0, 0]), prefix: 12, family: 'ipv4' },
  { subnet: buildIpv4([192, 168, 0, 0]), prefix: 16, family: 'ipv4' },
  { subnet: buildIpv4([224, 0, 0, 0]), prefix: 4, family: 'ipv4' },
  { subnet: buildIpv4([240, 0, 0, 0]), prefix: 4, family: 'ipv4' },
  { subnet: buildIpv6([0, 0, 0, 0, 0, 0, 0, 0]), prefix: 128, family: 'ipv6' },
  { subnet: buildIpv6([0, 0, 0, 0, 0, 0, 0, 1]), prefix: 128, family: 'ipv6' },
  // IPv4-compatible and IPv4-mapped, whatever v4 address they carry
  { subnet: '::', prefix: 96, family: 'ipv6' },
  { subnet: '::ffff:0:0', prefix: 96, family: 'ipv6' },
  { subnet: buildIpv6(['fc00', 0, 0, 0, 0, 0, 0, 0]), prefix: 7, family: 'ipv6' },
  { subnet: buildIpv6(['fe80', 0, 0, 0, 0, 0, 0, 0]), prefix: 10, family: 'ipv6' },
  { subnet: buildIpv6(['ff00', 0, 0, 0, 0, 0, 0, 0]), prefix: 8, family: 'ipv6' },
];

export function createDefaultBlockList(): BlockList {
  const list = new BlockList();
  for (const entry of BLOCKED_SUBNETS) {
    list.addSubnet(entry.subnet, entry.prefix, entry.family);
  }
  return list;
}

function stripIpv6ZoneId(ip: string): string {
  const zoneIndex = ip.indexOf('%');
  if (zoneIndex <= 0) return ip;
  return ip.slice(0, zoneIndex);
}

function extractMappedIpv4(ip: string): string | null {
  if (!ip.startsWith(IPV6_MAPPED_PREFIX)) return null;
  const mapped = ip.slice(IPV6_MAPPED_PREFIX.length);
  return isIP(mapped) === 4 ? mapped : null;
}

/**
 * Canonical `{ ip, family }` for a literal address, or null when the input
 * is not an IP at all. Accepts URL-style `[v6]` brackets.
 */
export function normalizeIpForBlockList(
  input: string
): { ip: string; family: IpFamily } | null {
  const lowered = input.trim().toLowerCase().replace(/^\[|\]$/g, '');
  if (!lowered) return null;
  const normalizedInput = stripIpv6ZoneId(lowered);

  switch (isIP(normalizedInput)) {
    case 4:
      return { ip: normalizedInput, family: 'ipv4' };
    case 6: {
      const mapped = extractMappedIpv4(normalizedInput);
      return mapped
        ? { ip: mapped, family: 'ipv4' }
        : { ip: normalizedInput, family: 'ipv6' };
    }
    default:
      return null;
  }
}

const DEFAULT_BLOCK_LIST = createDefaultBlockList();

/**
 * True for loopback, link-local, private and other non-routable addresses.
 * Non-IP input is never blocked here; hostnames are checked after lookup.
 */
export function isBlockedAddress(address: string): boolean {
  const normalized = normalizeIpForBlockList(address);
  if (normalized === null) return false;
  return DEFAULT_BLOCK_LIST.check(normalized.ip, normalized.family);
}
