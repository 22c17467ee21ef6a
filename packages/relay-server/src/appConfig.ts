import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

export const ResponseModalitySchema = z.enum(['AUDIO', 'TEXT']);
export type ResponseModality = z.infer<typeof ResponseModalitySchema>;

const ToolsConfigSchema = z.object({
  /**
   * Names of standard tools to expose upstream. When omitted every standard
   * tool is registered.
   */
  allowlist: z.array(NonEmptyTrimmedStringSchema).optional(),
});

export const AppConfigSchema = z.object({
  systemInstruction: NonEmptyTrimmedStringSchema.optional(),
  voiceName: NonEmptyTrimmedStringSchema.optional(),
  responseModalities: z.array(ResponseModalitySchema).min(1).default(['AUDIO']),
  /**
   * Adds the upstream's built-in search tool to the session setup.
   */
  googleSearch: z.boolean().default(true),
  contextWindowCompression: z.boolean().default(false),
  tools: ToolsConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export class AppConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AppConfigError';
  }
}

export const DEFAULT_SYSTEM_INSTRUCTION =
  'You are a helpful voice agent with access to real-time information. ' +
  'Keep responses concise and conversational. ' +
  'Use the available tools when the user asks about the time or the weather.';

export function defaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Loads the optional JSON app config. A missing file yields the defaults; an
 * unreadable, malformed or invalid file throws {@link AppConfigError}.
 */
export function loadAppConfig(configPath: string | undefined): AppConfig {
  if (!configPath) {
    return defaultAppConfig();
  }
  const resolvedPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      console.warn(`[config] No app config at ${resolvedPath}; using defaults`);
      return defaultAppConfig();
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new AppConfigError(`Failed to read app config at ${resolvedPath}: ${message}`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new AppConfigError(`App config at ${resolvedPath} is not valid JSON: ${message}`);
  }

  const result = AppConfigSchema.safeParse(parsedJson);
  if (!result.success) {
    throw new AppConfigError(
      `Invalid app config at ${resolvedPath}: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}
