/**
 * Core types for sdkpath
 */

// ============================================================================
// Audit Types
// ============================================================================

/** A top-level storage root to probe, e.g. `C:\`. */
export type VolumeRoot = string;

/**
 * Outcome of one audit pass. `has64First` is only meaningful when both
 * `has32` and `has64` are true.
 */
export interface AuditResult {
  has32: boolean;
  has64: boolean;
  has64First: boolean;
  path32: string;
  path64: string;
}

export type AuditClassification =
  | "sdk64-only"
  | "sdk32-only"
  | "both-correct-order"
  | "both-wrong-order"
  | "not-found";

export type AuditSeverity = "pass" | "warn" | "fail";

export interface UnchangedOutcome {
  kind: "unchanged";
  result: AuditResult;
}

export interface ChangedOutcome {
  kind: "changed";
  result: AuditResult;
  classification: AuditClassification;
  severity: AuditSeverity;
  /** Whether the message survived positive-result suppression */
  displayed: boolean;
  /** Composed diagnostic text, null when suppressed */
  message: string | null;
}

export type AuditOutcome = UnchangedOutcome | ChangedOutcome;

// ============================================================================
// Message Types
// ============================================================================

export const SUPPORTED_LANGUAGES = ["en", "fr"] as const;
export type LanguageTag = (typeof SUPPORTED_LANGUAGES)[number];
export type LanguageSetting = LanguageTag | "auto";

export type MessageId =
  | "explanation"
  | "systemPath"
  | "sdk64Only"
  | "sdk32Only"
  | "bothCorrect"
  | "bothWrongOrder"
  | "notFound";

export type MessageCatalog = Readonly<Record<MessageId, string>>;

// ============================================================================
// Configuration Types
// ============================================================================

export type PathScope = "machine" | "process";

export interface SdkPathConfig {
  showPositiveMessages: boolean;
  sdkFolderMarker: string;
  language: LanguageSetting;
  pathScope: PathScope;
  watchExtensions: string[];
  debounceMs: number;
}

// ============================================================================
// Store Types
// ============================================================================

/**
 * Where the previous audit result lives between invocations.
 * Reads and writes are synchronous and replace the whole record.
 */
export interface AuditResultStore {
  load(): AuditResult | null;
  save(result: AuditResult): void;
  clear(): void;
}
