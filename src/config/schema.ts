import { z } from 'zod';

export const BRANCH_NAME_PATTERN = /^(?!-)(?!.*\.\.)[A-Za-z0-9._/-]+$/;
export const OWNER_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*)$/;
export const REPOSITORY_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

const REPOSITORY_NAME_MESSAGE = 'Repository name may only contain letters, digits, ".", "_" and "-"';

export const ConfigSchema = z.object({
  git: z
    .object({
      binary: z.string().min(1).default('git'),
    })
    .default({}),
  publish: z
    .object({
      branch: z.string().regex(BRANCH_NAME_PATTERN, 'Invalid branch name').default('main'),
      remote: z.string().regex(BRANCH_NAME_PATTERN, 'Invalid remote name').default('origin'),
      commitMessage: z.string().min(1).default('Initial commit'),
    })
    .default({}),
  repository: z
    .object({
      host: z.string().min(1).default('github.com'),
      protocol: z.enum(['https', 'ssh']).default('https'),
      // Falls back to the working directory's base name
      name: z.string().regex(REPOSITORY_NAME_PATTERN, REPOSITORY_NAME_MESSAGE).optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Account or organization name used to fill the suggested remote URL.
 */
export const OwnerSchema = z
  .string()
  .trim()
  .min(1, 'Owner must not be empty')
  .regex(OWNER_PATTERN, 'Owner may only contain letters, digits, ".", "_" and "-"');

export const RepositoryNameSchema = z
  .string()
  .trim()
  .min(1, 'Repository name must not be empty')
  .regex(REPOSITORY_NAME_PATTERN, REPOSITORY_NAME_MESSAGE);
