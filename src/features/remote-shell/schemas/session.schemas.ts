import { z } from "zod";

export const DEFAULT_SHELL = "/bin/bash";
export const DEFAULT_TERM = "xterm";
export const DEFAULT_ROWS = 100;
export const DEFAULT_COLUMNS = 100;

/**
 * Validation schema for shell session configuration
 */
export const sessionConfigSchema = z.object({
  shell: z.string().min(1, "Shell path is required").default(DEFAULT_SHELL),
  term: z.string().min(1, "Terminal type is required").default(DEFAULT_TERM),
  rows: z.number().int().positive().default(DEFAULT_ROWS),
  columns: z.number().int().positive().default(DEFAULT_COLUMNS),
  env: z.record(z.string(), z.string()).default({}),
});

/**
 * Type exports for use in services
 */
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/**
 * Validate a session config and fill in defaults
 * @throws Error listing every invalid field
 */
export function parseSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid session config: ${issues}`);
  }
  return result.data;
}
