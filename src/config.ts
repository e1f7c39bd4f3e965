import { z } from 'zod';
import {
  DEFAULT_DHT_LOOKUP_TIMEOUT,
  DEFAULT_DHT_REPLICATION_LEVEL,
  DEFAULT_DNS_LOOKUP_TIMEOUT,
  DEFAULT_MAX_BACKGROUND_DHT_QUERIES,
  DEFAULT_MAX_RECURSION,
  DEFAULT_VPN_TIMEOUT,
} from './constants';
import { ConfigurationError } from './errors';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

// resolver configuration, all durations in ms
export const ResolverConfigSchema = z.object({
  dhtLookupTimeout: z.number().int().positive().default(DEFAULT_DHT_LOOKUP_TIMEOUT),
  dnsLookupTimeout: z.number().int().positive().default(DEFAULT_DNS_LOOKUP_TIMEOUT),
  vpnTimeout: z.number().int().positive().default(DEFAULT_VPN_TIMEOUT),
  maxRecursion: z.number().int().positive().default(DEFAULT_MAX_RECURSION),
  dhtReplicationLevel: z.number().int().positive().default(DEFAULT_DHT_REPLICATION_LEVEL),
  maxBackgroundDhtQueries: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_BACKGROUND_DHT_QUERIES),
  logLevel: LogLevelSchema.default('info'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

// environment variables that map onto the configuration
const EnvSchema = z.object({
  GNS_DHT_LOOKUP_TIMEOUT: z.coerce.number().optional(),
  GNS_DNS_LOOKUP_TIMEOUT: z.coerce.number().optional(),
  GNS_VPN_TIMEOUT: z.coerce.number().optional(),
  GNS_MAX_RECURSION: z.coerce.number().optional(),
  GNS_MAX_PARALLEL_BACKGROUND_QUERIES: z.coerce.number().optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
});

// merge defaults and validate, throws ConfigurationError listing every issue
export function parseResolverConfig(input: ResolverConfigInput = {}): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid resolver configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// read the configuration from environment variables (unset ones keep their defaults)
export function resolverConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid resolver environment: ${formatIssues(result.error)}`);
  }
  const vars = result.data;
  return parseResolverConfig({
    ...(vars.GNS_DHT_LOOKUP_TIMEOUT !== undefined && { dhtLookupTimeout: vars.GNS_DHT_LOOKUP_TIMEOUT }),
    ...(vars.GNS_DNS_LOOKUP_TIMEOUT !== undefined && { dnsLookupTimeout: vars.GNS_DNS_LOOKUP_TIMEOUT }),
    ...(vars.GNS_VPN_TIMEOUT !== undefined && { vpnTimeout: vars.GNS_VPN_TIMEOUT }),
    ...(vars.GNS_MAX_RECURSION !== undefined && { maxRecursion: vars.GNS_MAX_RECURSION }),
    ...(vars.GNS_MAX_PARALLEL_BACKGROUND_QUERIES !== undefined && {
      maxBackgroundDhtQueries: vars.GNS_MAX_PARALLEL_BACKGROUND_QUERIES,
    }),
    ...(vars.LOG_LEVEL !== undefined && { logLevel: vars.LOG_LEVEL }),
  });
}

// render zod issues as "path: message; path: message"
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
