// src/config/ConfigValidator.ts

import { z } from 'zod';

const PathMapSchema = z.record(z.string(), z.string().nullable());

// OAuth2 resource owner built from explicit endpoints
const OAuth2OwnerConfigSchema = z.object({
  type: z.literal('oauth2'),
  checkPath: z.string(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  authorizationEndpoint: z.string().url(),
  tokenEndpoint: z.string().url().optional(),
  scopes: z.array(z.string().min(1)).default([]),
  paths: PathMapSchema.optional(),
});

// Resource owner instance supplied by the application at bootstrap
const CustomOwnerConfigSchema = z.object({
  type: z.literal('custom'),
  checkPath: z.string(),
  paths: PathMapSchema.optional(),
});

const ResourceOwnerConfigSchema = z.discriminatedUnion('type', [
  OAuth2OwnerConfigSchema,
  CustomOwnerConfigSchema,
]);

const FirewallConfigSchema = z
  .record(z.string().min(1), ResourceOwnerConfigSchema)
  .refine((owners) => Object.keys(owners).length > 0, {
    message: 'At least one resource owner must be configured',
  });

const RoutesConfigSchema = z
  .object({
    connectService: z.string().min(1).optional(),
    serviceRedirect: z.string().min(1).optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z
  .object({
    firewall: z.string().min(1),
    connect: z.boolean().default(false),
    routes: RoutesConfigSchema,
    firewalls: z.record(z.string().min(1), FirewallConfigSchema),
    logging: LoggerConfigSchema,
    metrics: MetricsConfigSchema,
  })
  .refine((data) => Object.prototype.hasOwnProperty.call(data.firewalls, data.firewall), {
    message: 'firewall must name one of the configured firewalls',
    path: ['firewall'],
  });

export type InitConfig = z.input<typeof InitConfigSchema>;
export type ValidatedConfig = z.output<typeof InitConfigSchema>;
export type ResourceOwnerConfig = z.output<typeof ResourceOwnerConfigSchema>;

/**
 * Validate initialization configuration
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ValidatedConfig {
  return InitConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(config: unknown): {
  success: boolean;
  data?: ValidatedConfig;
  errors?: string[];
} {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
