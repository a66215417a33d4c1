import { z } from "zod";

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.union([z.number(), z.string().regex(/^\d+$/)]).transform((value) => Number(value)),
  scope: z.string().optional()
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

// Fields follow the provider's OAuth2 error response; anything beyond `error` is optional.
export const providerErrorSchema = z
  .object({
    error: z.string().min(1),
    error_description: z.string().optional(),
    error_codes: z.array(z.number().int()).optional(),
    suberror: z.string().optional(),
    claims: z.string().optional(),
    correlation_id: z.string().optional(),
    trace_id: z.string().optional(),
    timestamp: z.string().optional()
  })
  .passthrough();

export type ProviderErrorBody = z.infer<typeof providerErrorSchema>;

const relativePath = z
  .string()
  .min(1)
  .max(2048)
  .refine((value) => value.startsWith("/") && !value.startsWith("//") && !value.includes("\\"), {
    message: "path must be a relative path starting with a single '/'."
  });

export const downstreamCallSchema = z.object({
  method: z.enum(["GET", "POST"]).default("GET"),
  path: relativePath,
  body: z.unknown().optional()
});

export type DownstreamCall = z.infer<typeof downstreamCallSchema>;
