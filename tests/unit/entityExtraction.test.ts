import { describe, it, expect } from 'vitest';
import { extractIocs, mergeEntities } from '../../src/services/entityExtraction.js';

describe('extractIocs', () => {
  it('finds urls, addresses and CVEs without re-reporting the url host as a domain', () => {
    expect(extractIocs('Beacon to http://evil.example.com/payload from 10.0.0.5 exploiting cve-2024-12345')).toEqual([
      { type: 'url', value: 'http://evil.example.com/payload' },
      { type: 'ipv4', value: '10.0.0.5' },
      { type: 'cve', value: 'CVE-2024-12345' },
    ]);
  });

  it('reports standalone domains lower-cased', () => {
    expect(extractIocs('Contact the admin at mail.Example.org.')).toEqual([
      { type: 'domain', value: 'mail.example.org' },
    ]);
  });

  it('requires mixed hex for file hashes', () => {
    expect(extractIocs('hash D41D8CD98F00B204E9800998ECF8427E and 12345678901234567890123456789012')).toEqual([
      { type: 'md5', value: 'd41d8cd98f00b204e9800998ecf8427e' },
    ]);
  });

  it('returns nothing for plain prose', () => {
    expect(extractIocs('Nothing suspicious here')).toEqual([]);
    expect(extractIocs('')).toEqual([]);
  });
});

describe('mergeEntities', () => {
  it('keeps the first spelling of a case-insensitive duplicate', () => {
    expect(
      mergeEntities(
        [{ type: 'device_id', value: 'LPTP-553' }],
        [
          { type: 'device_id', value: 'lptp-553' },
          { type: 'ipv4', value: ' 1.2.3.4 ' },
          { type: 'poi', value: '  ' },
        ],
      ),
    ).toEqual([
      { type: 'device_id', value: 'LPTP-553' },
      { type: 'ipv4', value: '1.2.3.4' },
    ]);
  });
});
