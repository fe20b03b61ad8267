import dns, { type LookupAddress } from 'node:dns';
import type { LookupFunction } from 'node:net';

import type { ProxyConfig } from '../config/index.js';
import { PolicyViolationError } from '../errors/app-error.js';
import { URLMatcher } from '../lib/url-matcher.js';
import { isBlockedAddress } from '../utils/ip-address.js';

export const BLOCKED_ADDRESS_CODE = 'EBLOCKED';

export type HostResolver = (hostname: string) => Promise<LookupAddress[]>;

export const systemResolver: HostResolver = (hostname) =>
  dns.promises.lookup(hostname, { all: true, verbatim: true });

/**
 * Raised from inside the connection pool's lookup when a name resolves to
 * a blocked address. Carries an errno-style code so it survives the fetch
 * layer wrapping it as a `cause`.
 */
export class BlockedAddressError extends Error {
  readonly code = BLOCKED_ADDRESS_CODE;

  constructor(
    readonly hostname: string,
    readonly address: string
  ) {
    super(`Blocked address ${address} for ${hostname}`);
    this.name = 'BlockedAddressError';
  }
}

type GuardOptions = Pick<
  ProxyConfig,
  'allowCredentialUrls' | 'noIpFiltering' | 'allowList' | 'denyList'
>;

function isLocalhostName(hostname: string): boolean {
  const name = hostname.toLowerCase().replace(/\.+$/, '');
  return name === 'localhost' || name.endsWith('.localhost');
}

function stripPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const colon = host.indexOf(':');
  // a second colon means a bare IPv6 literal, not host:port
  if (colon === -1 || host.indexOf(':', colon + 1) !== -1) return host;
  return host.slice(0, colon);
}

/**
 * Decides whether a target may be fetched. Re-run for the initial target
 * and for every redirect hop.
 */
export class NetworkGuard {
  private readonly allowList: URLMatcher | null;
  private readonly denyList: URLMatcher | null;

  constructor(private readonly options: GuardOptions) {
    this.allowList =
      options.allowList.length > 0 ? new URLMatcher(options.allowList) : null;
    this.denyList =
      options.denyList.length > 0 ? new URLMatcher(options.denyList) : null;
  }

  get filtersAddresses(): boolean {
    return !this.options.noIpFiltering;
  }

  /**
   * Reject loopback names and literal addresses in blocked ranges. The
   * host may carry a `:port` suffix; ports never change the verdict.
   */
  validateHost(host: string, port?: number): void {
    if (!this.filtersAddresses) return;
    const hostname = stripPort(host.trim());
    if (isLocalhostName(hostname) || isBlockedAddress(hostname)) {
      const target = port === undefined ? hostname : `${hostname}:${port}`;
      throw new PolicyViolationError(
        'blocked-host',
        `Blocked host: ${target}`,
        target
      );
    }
  }

  validateUrl(url: URL): void {
    const href = url.href;
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new PolicyViolationError(
        'invalid-url',
        `Unsupported protocol: ${url.protocol}`,
        href
      );
    }
    if (!url.hostname) {
      throw new PolicyViolationError('invalid-url', 'URL has no host', href);
    }
    if ((url.username || url.password) && !this.options.allowCredentialUrls) {
      throw new PolicyViolationError(
        'credentials',
        'URLs with embedded credentials are not allowed',
        href
      );
    }

    if (this.denyList?.checkURL(url)) {
      throw new PolicyViolationError(
        'denied-host',
        `Denied host: ${url.hostname}`,
        href
      );
    }
    if (this.allowList && !this.allowList.checkURL(url)) {
      throw new PolicyViolationError(
        'not-allowed-host',
        `Host not in allow list: ${url.hostname}`,
        href
      );
    }

    this.validateHost(url.hostname);
  }

  isBlockedAddress(address: string): boolean {
    return this.filtersAddresses && isBlockedAddress(address);
  }

  /**
   * Lookup for the outbound connection pool. Every address a name resolves
   * to is checked before any socket is opened, so the address dialled is
   * the one that passed.
   */
  createLookup(resolve: HostResolver = systemResolver): LookupFunction {
    return (hostname, options, callback) => {
      const onResolved = (addresses: LookupAddress[]): void => {
        const blocked = addresses.find((entry) =>
          this.isBlockedAddress(entry.address)
        );
        if (blocked) {
          callback(
            new BlockedAddressError(hostname, blocked.address),
            '',
            undefined
          );
          return;
        }

        const wanted =
          options.family === 6 || options.family === 4
            ? addresses.filter((entry) => entry.family === options.family)
            : addresses;
        const first = wanted[0];
        if (first === undefined) {
          const error: NodeJS.ErrnoException = new Error(
            `No addresses found for ${hostname}`
          );
          error.code = 'ENOTFOUND';
          callback(error, '', undefined);
          return;
        }

        if (options.all) {
          callback(null, wanted);
        } else {
          callback(null, first.address, first.family);
        }
      };

      void resolve(hostname).then(onResolved, (error: unknown) => {
        callback(
          error instanceof Error ? error : new Error(String(error)),
          '',
          undefined
        );
      });
    };
  }
}
