import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Schema of the identity configuration file (clients, resources, test users).
 * Loaded once at startup and turned into immutable registries.
 */

const scopeNameSchema = z
  .string()
  .min(1)
  .regex(/^[\x21\x23-\x5B\x5D-\x7E]+$/, 'Scope names cannot contain spaces or quotes');

const absoluteUriSchema = z.string().url();

const grantTypeSchema = z.enum(['authorization_code', 'client_credentials', 'refresh_token']);

const ttlSchema = z.number().int().positive();

export const clientConfigSchema = z
  .object({
    clientId: z.string().min(1),
    clientName: z.string().min(1).optional(),
    clientSecret: z.string().min(1).optional(),
    clientSecretHash: z.string().startsWith('$scrypt$').optional(),
    allowedGrantTypes: z.array(grantTypeSchema).min(1),
    redirectUris: z.array(absoluteUriSchema).default([]),
    postLogoutRedirectUris: z.array(absoluteUriSchema).default([]),
    allowedScopes: z.array(scopeNameSchema).default([]),
    requirePkce: z.boolean().default(true),
    allowOfflineAccess: z.boolean().default(false),
    accessTokenTtl: ttlSchema.optional(),
    identityTokenTtl: ttlSchema.optional(),
    refreshTokenTtl: ttlSchema.optional(),
    slidingRefreshTokenTtl: ttlSchema.optional(),
    refreshTokenUsage: z.enum(['one-time', 'reuse']).default('one-time'),
    refreshTokenExpiration: z.enum(['absolute', 'sliding']).default('absolute'),
  })
  .strict()
  .refine((client) => !(client.clientSecret && client.clientSecretHash), {
    message: 'Specify either clientSecret or clientSecretHash, not both',
  })
  .refine(
    (client) => !client.allowedGrantTypes.includes('authorization_code') || client.redirectUris.length > 0,
    { message: 'Clients using authorization_code must register at least one redirect URI' }
  );

export const identityResourceConfigSchema = z
  .object({
    name: scopeNameSchema,
    displayName: z.string().min(1),
    description: z.string().optional(),
    userClaims: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const apiScopeConfigSchema = z
  .object({
    name: scopeNameSchema,
    displayName: z.string().min(1),
    description: z.string().optional(),
  })
  .strict();

export const apiResourceConfigSchema = z
  .object({
    name: z.string().min(1),
    displayName: z.string().min(1),
    scopes: z.array(scopeNameSchema).min(1),
  })
  .strict();

export const claimValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const testUserConfigSchema = z
  .object({
    subjectId: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1).optional(),
    passwordHash: z.string().startsWith('$scrypt$').optional(),
    claims: z.record(claimValueSchema).default({}),
  })
  .strict()
  .refine((user) => Boolean(user.password) !== Boolean(user.passwordHash), {
    message: 'Specify exactly one of password or passwordHash',
  });

export const identityConfigSchema = z
  .object({
    clients: z.array(clientConfigSchema),
    identityResources: z.array(identityResourceConfigSchema).default([]),
    apiScopes: z.array(apiScopeConfigSchema).default([]),
    apiResources: z.array(apiResourceConfigSchema).default([]),
    testUsers: z.array(testUserConfigSchema).default([]),
  })
  .strict();

export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type IdentityResourceConfig = z.infer<typeof identityResourceConfigSchema>;
export type ApiScopeConfig = z.infer<typeof apiScopeConfigSchema>;
export type ApiResourceConfig = z.infer<typeof apiResourceConfigSchema>;
export type TestUserConfig = z.infer<typeof testUserConfigSchema>;
export type IdentityConfig = z.infer<typeof identityConfigSchema>;
export type IdentityConfigInput = z.input<typeof identityConfigSchema>;

/**
 * Validate an identity configuration object
 */
export function parseIdentityConfig(input: unknown): IdentityConfig {
  const result = identityConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid identity configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Read and validate the identity configuration file
 */
export function loadIdentityConfig(path: string): IdentityConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(`Could not read identity configuration from ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Identity configuration at ${path} is not valid JSON`, { cause: err });
  }

  return parseIdentityConfig(json);
}
