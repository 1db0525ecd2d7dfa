import { z } from 'zod';
import { LauncherError, LauncherErrorCode } from '../shared/errors.js';

export const LauncherSettingsSchema = z.object({
  python_executable: z
    .string()
    .nullable()
    .optional()
    .describe('Python executable to use (optional, defaults to auto-detection)'),
  environment: z
    .record(z.string(), z.string())
    .optional()
    .describe('Additional environment variables for Serena'),
});

export type LauncherSettings = z.infer<typeof LauncherSettingsSchema>;

/**
 * Validate the raw settings blob handed over by the host. Unknown keys are
 * dropped; a missing blob means "no overrides".
 */
export function parseSettings(raw: unknown): LauncherSettings {
  if (raw === undefined || raw === null) return {};

  const parsed = LauncherSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LauncherError(LauncherErrorCode.CONFIGURATION_ERROR, `Invalid settings: ${detail}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
