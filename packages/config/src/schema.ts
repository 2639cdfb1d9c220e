/**
 * Configuration Schema with Zod Validation
 *
 * Runtime validation and type safety for `git-handle.config.yaml`.
 */

import { z } from 'zod';

import { GIT_HANDLE_DEFAULTS, RESERVED_ENV_VARS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * Git Settings Schema
 */
export const GitSettingsSchema = z.object({
  /** Command name or path of the git binary (default: 'git') */
  binary: z.string().min(1, 'Git binary cannot be empty').default(GIT_HANDLE_DEFAULTS.BINARY),

  /** Extra environment variables for every git invocation */
  env: z
    .record(z.string(), z.string())
    .superRefine((env, ctx) => {
      for (const name of RESERVED_ENV_VARS) {
        if (name in env) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [name],
            message: `${name} is set from the resolved repository and cannot be configured`,
          });
        }
      }
    })
    .default({}),

  /** Remote used when a command names none (default: 'origin') */
  remote: z.string().min(1, 'Remote name cannot be empty').default(GIT_HANDLE_DEFAULTS.REMOTE),
}).strict();

export type GitSettings = z.output<typeof GitSettingsSchema>;

/**
 * Root configuration object
 */
export const GitHandleConfigSchema = z.object({
  /** Optional: JSON schema reference for editor support */
  $schema: z.string().optional(),

  /** Git invocation settings */
  git: GitSettingsSchema.default({}),
}).strict();

/** Configuration as written in the file (all fields optional) */
export type GitHandleConfigInput = z.input<typeof GitHandleConfigSchema>;

/** Configuration with defaults applied */
export type GitHandleConfig = z.output<typeof GitHandleConfigSchema>;

/**
 * Validate configuration object
 *
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(GitHandleConfigSchema);

/**
 * Validate configuration object, reporting errors instead of throwing
 */
export const safeValidateConfig = createSafeValidator(GitHandleConfigSchema);
