import { z } from 'zod'
import { extractRepoNameFromUrl } from '../repository-url'
import type { ParseResult } from '../types'

/**
 * Repository registration as written in the repositories YAML file.
 * Keys are snake_case in YAML and camelCase once parsed.
 */
export const repositoryRegistrationSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    url: z.string().trim().min(1, 'url is required'),
    branch: z.string().trim().min(1).default('main'),
    local_path: z.string().trim().min(1).optional(),
    active: z.boolean().default(true),
  })
  .strict()
  .transform((raw) => ({
    name: raw.name ?? extractRepoNameFromUrl(raw.url),
    url: raw.url,
    branch: raw.branch,
    localPath: raw.local_path ?? null,
    isActive: raw.active,
  }))

export const repositoriesFileSchema = z
  .object({
    repositories: z.array(repositoryRegistrationSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>()
    file.repositories.forEach((repo, index) => {
      if (seen.has(repo.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['repositories', index, 'name'],
          message: `Duplicate repository name: ${repo.name}`,
        })
      }
      seen.add(repo.name)
    })
  })

export type RepositoryRegistration = z.output<typeof repositoryRegistrationSchema>
export type RepositoriesFile = z.output<typeof repositoriesFileSchema>

/**
 * Safely parse a repositories file, returning result with errors
 */
export function safeParseRepositoriesFile(data: unknown): ParseResult<RepositoriesFile> {
  const result = repositoriesFileSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}
