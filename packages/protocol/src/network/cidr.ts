// Network value - CIDR parsing, normalization and comparison
//
// Every network that enters the system passes through parseNetwork so that
// dedup and whitelist checks compare canonical forms only.

import ipaddr from 'ipaddr.js';

export type AddressFamily = 'ipv4' | 'ipv6';

/**
 * A normalized network range. `address` is the network address with all
 * host bits cleared, rendered in the family's canonical text form.
 */
export type Network = {
  readonly family: AddressFamily;
  readonly address: string;
  readonly prefixLength: number;
};

const MAX_PREFIX: Record<AddressFamily, number> = {
  ipv4: 32,
  ipv6: 128,
};

const PREFIX_PATTERN = /^\d{1,3}$/;

/**
 * Error for network text that cannot be parsed
 */
export class InvalidNetworkError extends Error {
  readonly code = 'INVALID_NETWORK';
  readonly input: string;
  readonly reason: string;

  constructor(input: string, reason: string) {
    super(`Invalid network "${input}": ${reason}`);
    this.name = 'InvalidNetworkError';
    this.input = input;
    this.reason = reason;
  }
}

function detectFamily(address: string): AddressFamily | null {
  if (address.includes(':')) {
    // Zone ids are interface-local and mean nothing to a remote agent
    if (address.includes('%')) return null;
    return ipaddr.IPv6.isValid(address) ? 'ipv6' : null;
  }
  return ipaddr.IPv4.isValidFourPartDecimal(address) ? 'ipv4' : null;
}

function renderAddress(family: AddressFamily, cidr: string): string {
  if (family === 'ipv4') {
    return ipaddr.IPv4.networkAddressFromCIDR(cidr).toString();
  }
  return ipaddr.IPv6.networkAddressFromCIDR(cidr).toRFC5952String();
}

/**
 * Parse a bare address or `address/prefix` text into a normalized Network.
 *
 * A bare address becomes a single-host network (/32 or /128). Host bits
 * beyond the prefix are masked off, so `10.1.2.3/8` becomes `10.0.0.0/8`.
 *
 * @throws InvalidNetworkError when the text is not a valid network
 */
export function parseNetwork(text: string): Network {
  const input = text.trim();
  if (input === '') {
    throw new InvalidNetworkError(text, 'empty input');
  }

  const parts = input.split('/');
  if (parts.length > 2) {
    throw new InvalidNetworkError(text, 'more than one "/"');
  }

  const [addressText, prefixText] = parts;
  const family = detectFamily(addressText);
  if (!family) {
    throw new InvalidNetworkError(text, `"${addressText}" is not an IPv4 or IPv6 address`);
  }

  const maxPrefix = MAX_PREFIX[family];
  let prefixLength = maxPrefix;
  if (prefixText !== undefined) {
    if (!PREFIX_PATTERN.test(prefixText)) {
      throw new InvalidNetworkError(text, `prefix length "${prefixText}" is not a number`);
    }
    prefixLength = Number(prefixText);
    if (prefixLength > maxPrefix) {
      throw new InvalidNetworkError(
        text,
        `prefix length ${prefixLength} exceeds ${maxPrefix} for ${family}`
      );
    }
  }

  return {
    family,
    address: renderAddress(family, `${addressText}/${prefixLength}`),
    prefixLength,
  };
}

/**
 * Check whether text parses as a network, without throwing.
 */
export function isValidNetwork(text: string): boolean {
  try {
    parseNetwork(text);
    return true;
  } catch (error) {
    if (error instanceof InvalidNetworkError) return false;
    throw error;
  }
}

/**
 * True iff every address of `inner` lies within `outer`.
 * Networks of different families never contain each other.
 */
export function networkContains(outer: Network, inner: Network): boolean {
  if (outer.family !== inner.family) return false;
  if (outer.prefixLength > inner.prefixLength) return false;

  if (outer.family === 'ipv4') {
    return ipaddr.IPv4.parse(inner.address).match(
      ipaddr.IPv4.parse(outer.address),
      outer.prefixLength
    );
  }
  return ipaddr.IPv6.parse(inner.address).match(
    ipaddr.IPv6.parse(outer.address),
    outer.prefixLength
  );
}

/**
 * Exact equality of normalized forms. A /24 never equals one of its /32s.
 */
export function networkEquals(a: Network, b: Network): boolean {
  return (
    a.family === b.family &&
    a.address === b.address &&
    a.prefixLength === b.prefixLength
  );
}

/**
 * Canonical `address/prefixLength` text. Single hosts keep their prefix.
 */
export function networkToText(network: Network): string {
  return `${network.address}/${network.prefixLength}`;
}

/**
 * Parse and re-render network text in canonical form.
 *
 * @throws InvalidNetworkError when the text is not a valid network
 */
export function normalizeCidr(text: string): string {
  return networkToText(parseNetwork(text));
}
