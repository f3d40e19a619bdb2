/**
 * Zod schemas for the documents the Docker CLI keeps on disk.
 *
 *  - config.json (global configuration and registry auths)
 *  - contexts/meta/<hash>/meta.json (per-context endpoint metadata)
 *
 * Keys the resolver does not read are passed through untouched.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// config.json
// ---------------------------------------------------------------------------

/**
 * Scalar field of an `auths` entry. Numbers and booleans are read as their
 * text; any other non-string value is treated as absent.
 */
const AuthFieldSchema = z
  .preprocess(
    (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
    z.string().nullish()
  )
  .catch(null)

/** One entry of the `auths` object */
export const DockerAuthEntrySchema = z
  .object({
    username: AuthFieldSchema,
    password: AuthFieldSchema,
    email: AuthFieldSchema,
    /** base64 of `username:password` */
    auth: AuthFieldSchema,
  })
  .passthrough()

/** An entry that is not an object (e.g. `null`) reads as an entry with no fields */
const LenientAuthEntrySchema = z.preprocess(
  (value) => (value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {}),
  DockerAuthEntrySchema
)

export type DockerAuthEntry = z.infer<typeof DockerAuthEntrySchema>

export const DockerConfigFileSchema = z
  .object({
    currentContext: z.string().nullish(),
    credsStore: z.string().nullish(),
    credHelpers: z.record(z.string()).nullish(),
    auths: z.record(LenientAuthEntrySchema).nullish(),
  })
  .passthrough()

export type DockerConfigFile = z.infer<typeof DockerConfigFileSchema>

// ---------------------------------------------------------------------------
// meta.json
// ---------------------------------------------------------------------------

export const DockerEndpointSchema = z
  .object({
    Host: z.string().nullish(),
    SkipTLSVerify: z.boolean().nullish(),
  })
  .passthrough()

export type DockerEndpoint = z.infer<typeof DockerEndpointSchema>

export const DockerContextMetaSchema = z
  .object({
    Name: z.string().nullish(),
    Endpoints: z
      .object({
        docker: DockerEndpointSchema.nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough()

export type DockerContextMeta = z.infer<typeof DockerContextMetaSchema>

/**
 * Render zod issues one per line, prefixed with their JSON path.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  • ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n')
}
