import fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_SERVERS, DEFAULT_SOURCES } from '../blocklists/defaults.js';
import { CATEGORIES, SOURCE_FORMATS, type SourceConfig } from '../blocklists/types.js';
import { PROTOCOLS, type ServerConfig } from '../upstream/types.js';
import { ConfigError } from './errors.js';

const sourceSchema = z.object({
  name: z.string().trim().min(1).max(100),
  url: z
    .string()
    .trim()
    .refine((v) => /^(https?:|data:)/i.test(v), 'must be an http(s) or data: URL'),
  format: z.enum(SOURCE_FORMATS),
  category: z.enum(CATEGORIES).optional().default('custom'),
  priority: z.number().int().optional().default(0),
  enabled: z.boolean().optional().default(true)
});

const serverSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    address: z.string().trim().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    protocol: z.enum(PROTOCOLS),
    priority: z.number().int().optional().default(0),
    dohPath: z.string().startsWith('/').optional().default('/dns-query'),
    tlsServername: z.string().trim().min(1).optional()
  })
  .transform(
    (s): ServerConfig => ({
      ...s,
      port: s.port ?? (s.protocol === 'dot' ? 853 : 443)
    })
  );

const coreConfigSchema = z.object({
  sources: z.array(sourceSchema).optional(),
  servers: z.array(serverSchema).optional()
});

export type CoreConfig = {
  sources: SourceConfig[];
  servers: ServerConfig[];
};

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dup = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) dup.add(n);
    seen.add(n);
  }
  return [...dup];
}

/**
 * Validates sources and servers. Missing sections fall back to the built-in
 * defaults; an explicitly empty server list is fatal.
 */
export function parseCoreConfig(input: unknown): CoreConfig {
  const parsed = coreConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      'invalid core configuration',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }

  const sources = parsed.data.sources ?? DEFAULT_SOURCES;
  const servers = parsed.data.servers ?? DEFAULT_SERVERS;
  const issues: string[] = [];

  if (!servers.length) issues.push('servers: at least one upstream server is required');
  for (const n of duplicates(sources.map((s) => s.name))) issues.push(`sources: duplicate name ${n}`);
  for (const n of duplicates(servers.map((s) => s.name))) issues.push(`servers: duplicate name ${n}`);
  if (issues.length) throw new ConfigError('invalid core configuration', issues);

  return { sources, servers };
}

/** Source list supplied at reconfiguration time (reload requests). */
export function parseSourceList(input: unknown): SourceConfig[] {
  const parsed = z.array(sourceSchema).safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      'invalid source list',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  const dup = duplicates(parsed.data.map((s) => s.name));
  if (dup.length) throw new ConfigError('invalid source list', dup.map((n) => `duplicate name ${n}`));
  return parsed.data;
}

export async function loadCoreConfig(file: string): Promise<CoreConfig> {
  if (!file) return parseCoreConfig({});

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`cannot read core configuration file ${file}`, [], { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`core configuration file ${file} is not valid JSON`, [], { cause: e });
  }
  return parseCoreConfig(json);
}
