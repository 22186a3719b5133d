import { z } from 'zod';

// ============================================================================
// EVE SSO Schemas
// ============================================================================

export const EVESSOTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().min(1).optional(),
});

export type EVESSOTokenResponse = z.infer<typeof EVESSOTokenResponseSchema>;

export const JsonWebKeySchema = z.object({
  kty: z.string().optional(),
  alg: z.string().optional(),
  kid: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

export const JsonWebKeySetSchema = z.object({
  keys: z.array(JsonWebKeySchema),
});

export type JsonWebKeySet = z.infer<typeof JsonWebKeySetSchema>;

export const CHARACTER_SUBJECT_PATTERN = /^CHARACTER:EVE:(\d+)$/;

export const AuthClaimsSchema = z
  .object({
    sub: z
      .string()
      .regex(CHARACTER_SUBJECT_PATTERN, 'subject is not CHARACTER:EVE:<id>')
      .refine(
        (sub) => Number.isSafeInteger(Number(sub.slice(sub.lastIndexOf(':') + 1))),
        'subject character id is out of range',
      ),
    aud: z.union([z.string(), z.array(z.string())]),
    iss: z.string(),
    exp: z.number().int(),
  })
  .transform((claims) => ({
    ...claims,
    aud: Array.isArray(claims.aud) ? claims.aud : [claims.aud],
    characterId: Number(claims.sub.slice(claims.sub.lastIndexOf(':') + 1)),
  }));

export type AuthClaims = z.infer<typeof AuthClaimsSchema>;
