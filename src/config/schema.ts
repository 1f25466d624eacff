/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * Directory API settings schema
 */
export const DirectorySettingsSchema = z.object({
  url: z.string().url().default('https://securedrop.org/api/v1/directory/'),
});

/**
 * Scan settings schema
 */
export const ScanSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(8),
  timeout_seconds: z.number().int().min(1).max(600).default(30),
});

/**
 * Proxy settings schema
 */
export const ProxySettingsSchema = z.object({
  enabled: z.boolean().default(true),
  url: z
    .string()
    .regex(/^socks(4a?|5h?):\/\//, 'must be a socks4://, socks4a://, socks5:// or socks5h:// URL')
    .default('socks5h://127.0.0.1:9050'),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  format: z.enum(['json', 'pp']).default('json'),
  verbose: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  directory: DirectorySettingsSchema.default({
    url: 'https://securedrop.org/api/v1/directory/',
  }),
  scan: ScanSettingsSchema.default({
    concurrency: 8,
    timeout_seconds: 30,
  }),
  proxy: ProxySettingsSchema.default({
    enabled: true,
    url: 'socks5h://127.0.0.1:9050',
  }),
  output: OutputSettingsSchema.default({
    format: 'json',
    verbose: false,
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type DirectorySettings = z.infer<typeof DirectorySettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type ProxySettings = z.infer<typeof ProxySettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type OutputFormat = OutputSettings['format'];
