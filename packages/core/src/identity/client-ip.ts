import { BlockList, isIP } from 'net';
import { LOOPBACK_IP } from '../constants.js';
import { InvalidPolicyError } from '../errors/rate-limit-errors.js';

export type HeaderBag = Record<string, string | Array<string> | undefined>;

/**
 * Forwarding headers checked for a client address, highest priority first.
 */
export const CLIENT_IP_HEADERS = [
  'cf-connecting-ip',
  'client-ip',
  'x-forwarded-for',
  'x-forwarded',
  'x-cluster-client-ip',
  'forwarded-for',
  'forwarded',
] as const;

export interface ClientIpOptions {
  /**
   * Peer addresses (`10.0.0.2`) or CIDR ranges (`10.0.0.0/8`) allowed to set
   * forwarding headers. When omitted every peer is trusted.
   */
  trustedProxies?: ReadonlyArray<string>;
}

const nonPublicRanges = new BlockList();
// Private
nonPublicRanges.addSubnet('10.0.0.0', 8, 'ipv4');
nonPublicRanges.addSubnet('172.16.0.0', 12, 'ipv4');
nonPublicRanges.addSubnet('192.168.0.0', 16, 'ipv4');
nonPublicRanges.addSubnet('fc00::', 7, 'ipv6');
// Reserved
nonPublicRanges.addSubnet('0.0.0.0', 8, 'ipv4');
nonPublicRanges.addSubnet('127.0.0.0', 8, 'ipv4');
nonPublicRanges.addSubnet('169.254.0.0', 16, 'ipv4');
nonPublicRanges.addSubnet('240.0.0.0', 4, 'ipv4');
nonPublicRanges.addAddress('::', 'ipv6');
nonPublicRanges.addAddress('::1', 'ipv6');
nonPublicRanges.addSubnet('fe80::', 10, 'ipv6');

/**
 * True for a well-formed IPv4/IPv6 address outside private and reserved
 * ranges.
 */
export function isPublicIp(value: string): boolean {
  const family = isIP(value);
  if (family === 0) return false;
  return !nonPublicRanges.check(value, family === 4 ? 'ipv4' : 'ipv6');
}

const trustedProxyLists = new WeakMap<ReadonlyArray<string>, BlockList>();

/**
 * Build (once per array) the address list for `trustedProxies`. IPv4 entries
 * also match IPv4-mapped peers such as `::ffff:10.0.0.2`.
 */
export function trustedProxyList(entries: ReadonlyArray<string>): BlockList {
  const cached = trustedProxyLists.get(entries);
  if (cached) return cached;

  const list = new BlockList();
  for (const entry of entries) {
    const [address = '', prefix, ...rest] = entry.trim().split('/');
    const family = isIP(address);
    const type = family === 4 ? 'ipv4' : 'ipv6';
    const maxPrefix = family === 4 ? 32 : 128;
    const bits = prefix === undefined ? maxPrefix : Number(prefix);

    if (
      family === 0 ||
      rest.length > 0 ||
      (prefix !== undefined && !/^\d+$/.test(prefix)) ||
      bits > maxPrefix
    ) {
      throw new InvalidPolicyError(`Invalid trusted proxy: ${entry}`);
    }

    if (prefix === undefined) {
      list.addAddress(address, type);
    } else {
      list.addSubnet(address, bits, type);
    }
  }

  trustedProxyLists.set(entries, list);
  return list;
}

function isTrustedPeer(peer: string, entries: ReadonlyArray<string>): boolean {
  const family = isIP(peer);
  if (family === 0) return false;
  return trustedProxyList(entries).check(peer, family === 4 ? 'ipv4' : 'ipv6');
}

function firstHeaderValue(raw: string | Array<string> | undefined): string {
  if (raw === undefined) return '';
  const joined = Array.isArray(raw) ? raw.join(',') : raw;
  const [first = ''] = joined.split(',');
  return first.trim();
}

/**
 * Resolve the caller's address from forwarding headers, falling back to the
 * connection address and finally to the loopback address.
 */
export function getClientIp(
  headers: HeaderBag,
  remoteAddress: string | undefined,
  options: ClientIpOptions = {},
): string {
  const peer = remoteAddress?.trim() ?? '';
  const trustHeaders =
    options.trustedProxies === undefined ||
    isTrustedPeer(peer, options.trustedProxies);

  if (trustHeaders) {
    for (const header of CLIENT_IP_HEADERS) {
      const candidate = firstHeaderValue(headers[header]);
      if (candidate && isPublicIp(candidate)) {
        return candidate;
      }
    }
  }

  if (peer && isIP(peer) !== 0) {
    return peer;
  }

  return LOOPBACK_IP;
}
