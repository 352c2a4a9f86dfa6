import type { ServerConfig } from '../upstream/types.js';
import type { SourceConfig } from './types.js';

// A small, pragmatic baseline. Higher priority wins when sources disagree.
export const DEFAULT_SOURCES: SourceConfig[] = [
  {
    name: 'stevenblack-unified',
    url: 'https://raw.githubusercontent.com/StevenBlack/hosts/master/hosts',
    format: 'hosts',
    category: 'ads',
    priority: 1,
    enabled: true
  },
  {
    name: 'someonewhocares',
    url: 'https://someonewhocares.org/hosts/zero/hosts',
    format: 'hosts',
    category: 'tracking',
    priority: 2,
    enabled: true
  },
  {
    name: 'adguard-dns-filter',
    url: 'https://adguardteam.github.io/AdGuardSDNSFilter/Filters/filter.txt',
    format: 'filter-list',
    category: 'ads',
    priority: 3,
    enabled: true
  },

  // Category lists (disabled by default).
  {
    name: 'hagezi-threat-intelligence',
    url: 'https://raw.githubusercontent.com/hagezi/dns-blocklists/main/domains/tif.txt',
    format: 'plain-domains',
    category: 'malware',
    priority: 4,
    enabled: false
  },
  {
    name: 'adguard-tracking-protection',
    url: 'https://filters.adtidy.org/extension/chromium/filters/3.txt',
    format: 'filter-list',
    category: 'tracking',
    priority: 2,
    enabled: false
  }
];

// Encrypted resolvers only. There is no plain-DNS fallback.
export const DEFAULT_SERVERS: ServerConfig[] = [
  { name: 'cloudflare', address: '1.1.1.1', port: 853, protocol: 'dot', priority: 30, dohPath: '/dns-query', tlsServername: 'cloudflare-dns.com' },
  { name: 'quad9', address: '9.9.9.9', port: 853, protocol: 'dot', priority: 20, dohPath: '/dns-query', tlsServername: 'dns.quad9.net' },
  { name: 'google', address: '8.8.8.8', port: 853, protocol: 'dot', priority: 10, dohPath: '/dns-query', tlsServername: 'dns.google' },
  { name: 'cloudflare-doh', address: 'cloudflare-dns.com', port: 443, protocol: 'doh', priority: 5, dohPath: '/dns-query' }
];
