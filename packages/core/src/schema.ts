/**
 * Zod schemas for sdkpath configuration and persisted state
 */

import { z } from "zod";
import { SUPPORTED_LANGUAGES } from "./types.js";

// ============================================================================
// Audit Schemas
// ============================================================================

export const auditResultSchema = z.object({
  has32: z.boolean(),
  has64: z.boolean(),
  has64First: z.boolean(),
  path32: z.string(),
  path64: z.string(),
});

// ============================================================================
// Config Schemas
// ============================================================================

export const languageTagSchema = z.enum(SUPPORTED_LANGUAGES);

export const languageSettingSchema = z.union([z.literal("auto"), languageTagSchema]);

export const pathScopeSchema = z.enum(["machine", "process"]);

export const DEFAULT_SDK_FOLDER_MARKER = "dotnet\\";

export const DEFAULT_WATCH_EXTENSIONS = [".cs", ".csproj", ".sln", ".dll"];

export const sdkPathConfigSchema = z
  .object({
    showPositiveMessages: z.boolean().default(false),
    sdkFolderMarker: z.string().min(1).default(DEFAULT_SDK_FOLDER_MARKER),
    language: languageSettingSchema.default("auto"),
    pathScope: pathScopeSchema.default("machine"),
    watchExtensions: z
      .array(z.string().regex(/^\.[\w.-]+$/, "extensions start with a dot"))
      .default(DEFAULT_WATCH_EXTENSIONS),
    debounceMs: z.number().int().nonnegative().default(500),
  })
  .strict();
