import { describe, expect, test } from 'vitest';

import {
  buildIpv4,
  buildIpv6,
  isBlockedAddress,
  normalizeIpForBlockList,
} from '../../../src/utils/ip-address.js';

describe('ip-address', () => {
  describe('builders', () => {
    test('join address parts', () => {
      expect(buildIpv4([10, 0, 0, 1])).toBe('10.0.0.1');
      expect(buildIpv6(['fe80', 0, 0, 0, 0, 0, 0, 1])).toBe('fe80:0:0:0:0:0:0:1');
    });
  });

  describe('normalizeIpForBlockList', () => {
    test('strips brackets, case and zone ids', () => {
      expect(normalizeIpForBlockList('[FE80::1%eth0]')).toEqual({
        ip: 'fe80::1',
        family: 'ipv6',
      });
    });

    test('unwraps IPv4-mapped addresses', () => {
      expect(normalizeIpForBlockList('::ffff:127.0.0.1')).toEqual({
        ip: '127.0.0.1',
        family: 'ipv4',
      });
    });

    test('returns null for names', () => {
      expect(normalizeIpForBlockList('images.example.com')).toBeNull();
      expect(normalizeIpForBlockList('  ')).toBeNull();
    });
  });

  describe('isBlockedAddress', () => {
    test.each([
      '0.1.2.3',
      '10.255.255.255',
      '100.64.0.1',
      '127.1.2.3',
      '169.254.169.254',
      '172.20.0.1',
      '192.168.1.1',
      '224.0.0.1',
      '255.255.255.255',
      '::',
      '::1',
      'fd00::1',
      'fe80::1',
      'ff02::1',
      '::ffff:192.168.0.1',
    ])('blocks %s', (address) => {
      expect(isBlockedAddress(address)).toBe(true);
    });

    test.each([
      '8.8.8.8',
      '93.184.216.34',
      '172.32.0.1',
      '2606:2800:220:1::1',
      '::ffff:8.8.8.8',
      'images.example.com',
    ])('allows %s', (address) => {
      expect(isBlockedAddress(address)).toBe(false);
    });
  });
});
