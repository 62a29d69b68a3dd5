/**
 * Zod schemas for configuration and persisted documents
 */
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const MIN_UPDATE_INTERVAL = 60_000;

// Application config schema (environment driven)
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  logPretty: z.boolean().default(true),
  dataDir: z.string().min(1),
  configDir: z.string().min(1),
  updateInterval: z.coerce.number().int().min(MIN_UPDATE_INTERVAL).default(6 * 60 * 60 * 1000),
  ipCacheMaxAge: z.coerce.number().int().min(0).default(60 * 60 * 1000),
  httpTimeout: z.coerce.number().int().min(1000).default(15_000),
  contactEmail: z.string().email().optional(),
  runOnce: z.boolean().default(false),
});

const nonBlank = (field: string) =>
  z.string({ required_error: `'${field}' is required` }).refine((value) => value.trim().length > 0, {
    message: `'${field}' must not be empty or whitespace`,
  });

// Hostnames are keys of the stored hostname map, so `__proto__` cannot be one
const hostnameSchema = nonBlank('hostnames[]').refine((value) => value !== '__proto__', {
  message: "'hostnames[]' must not be '__proto__'",
});

// One account on the dynamic DNS provider and the hostnames it manages
export const providerConfigEntrySchema = z
  .object({
    username: z.string({ required_error: "'username' is required" }).min(1, "'username' must not be empty"),
    password: z.string({ required_error: "'password' is required" }).min(1, "'password' must not be empty"),
    hostnames: z
      .array(hostnameSchema, { required_error: "'hostnames' is required" })
      .min(1, "'hostnames' must not be empty")
      .refine((hostnames) => new Set(hostnames).size === hostnames.length, {
        message: "'hostnames' must not contain duplicates",
      }),
    ipAddress: nonBlank('ipAddress').nullish(),
  })
  .transform(({ ipAddress, ...entry }) => ({
    ...entry,
    desiredIpAddress: ipAddress ?? null,
  }));

export const providerConfigFileSchema = z
  .array(providerConfigEntrySchema)
  .min(1, 'list of DNS update entries is empty');

// On-disk shape of the discovery cache
export const cachedIpSnapshotSchema = z.object({
  ipAddress: z.string().min(1),
  lastTimeChecked: z.coerce.date(),
});

// On-disk hostname -> last pushed IP address map
export const hostnameIpMapSchema = z.record(z.string(), z.string());

export type LogLevel = z.infer<typeof logLevelSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProviderConfigEntry = z.infer<typeof providerConfigEntrySchema>;
export type CachedIpSnapshot = z.infer<typeof cachedIpSnapshotSchema>;
export type HostnameIpMap = z.infer<typeof hostnameIpMapSchema>;
