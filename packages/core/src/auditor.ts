/**
 * SDK PATH auditor
 *
 * Scans the executable search path for the 32-bit and 64-bit .NET SDK
 * install folders on each volume, compares the outcome with the result
 * recorded by the previous run, and composes a localized diagnostic when
 * something changed.
 *
 * The auditor never queries the host: the search path and volume roots are
 * plain inputs, and persistence goes through an AuditResultStore.
 */

import * as path from "node:path";
import { formatTemplate, getCatalog, DEFAULT_LANGUAGE, SDKPATH_VERSION } from "./messages.js";
import { DEFAULT_SDK_FOLDER_MARKER } from "./schema.js";
import type {
  AuditClassification,
  AuditOutcome,
  AuditResult,
  AuditResultStore,
  AuditSeverity,
  LanguageTag,
  MessageCatalog,
  MessageId,
  VolumeRoot,
} from "./types.js";

// ============================================================================
// Constants
// ============================================================================

export const PROGRAM_FILES_32 = "Program Files (x86)";
export const PROGRAM_FILES_64 = "Program Files";

/** What the previous run counts as when nothing was recorded yet. */
export const EMPTY_AUDIT_RESULT: Readonly<AuditResult> = Object.freeze({
  has32: false,
  has64: false,
  has64First: false,
  path32: "",
  path64: "",
});

const CLASSIFICATION_MESSAGES: Record<AuditClassification, MessageId> = {
  "sdk64-only": "sdk64Only",
  "sdk32-only": "sdk32Only",
  "both-correct-order": "bothCorrect",
  "both-wrong-order": "bothWrongOrder",
  "not-found": "notFound",
};

const CLASSIFICATION_SEVERITY: Record<AuditClassification, AuditSeverity> = {
  "sdk64-only": "pass",
  "sdk32-only": "fail",
  "both-correct-order": "pass",
  "both-wrong-order": "warn",
  "not-found": "fail",
};

// ============================================================================
// Pure Steps
// ============================================================================

export function candidatePaths(
  root: VolumeRoot,
  sdkFolderMarker: string = DEFAULT_SDK_FOLDER_MARKER,
): { path32: string; path64: string } {
  return {
    path32: path.win32.join(root, PROGRAM_FILES_32, sdkFolderMarker),
    path64: path.win32.join(root, PROGRAM_FILES_64, sdkFolderMarker),
  };
}

/**
 * Probe each volume root in order. The first root whose candidate appears
 * in the search path wins for that bitness, and scanning stops once both
 * are found. Ordering compares positions in the search path string, not
 * discovery order.
 */
export function scanSearchPath(
  searchPath: string,
  volumeRoots: readonly VolumeRoot[],
  sdkFolderMarker: string = DEFAULT_SDK_FOLDER_MARKER,
): AuditResult {
  let has32 = false;
  let has64 = false;
  let path32 = "";
  let path64 = "";

  for (const root of volumeRoots) {
    const candidates = candidatePaths(root, sdkFolderMarker);

    if (!has32 && searchPath.includes(candidates.path32)) {
      has32 = true;
      path32 = candidates.path32;
    }
    if (!has64 && searchPath.includes(candidates.path64)) {
      has64 = true;
      path64 = candidates.path64;
    }

    if (has32 && has64) break;
  }

  // Sentinel when fewer than two installs were found; never read then.
  const has64First = has32 && has64 ? searchPath.indexOf(path64) < searchPath.indexOf(path32) : true;

  return { has32, has64, has64First, path32, path64 };
}

export function classifyResult(result: AuditResult): AuditClassification {
  const { has32, has64 } = result;
  if (has64 && !has32) return "sdk64-only";
  if (!has64 && has32) return "sdk32-only";
  if (has64 && has32) return result.has64First ? "both-correct-order" : "both-wrong-order";
  return "not-found";
}

export function severityOf(classification: AuditClassification): AuditSeverity {
  return CLASSIFICATION_SEVERITY[classification];
}

export function isPositive(classification: AuditClassification): boolean {
  return severityOf(classification) === "pass";
}

/** The path a diagnostic names after its template. */
export function relevantPath(classification: AuditClassification, result: AuditResult): string {
  switch (classification) {
    case "sdk64-only":
    case "both-correct-order":
      return result.path64;
    case "sdk32-only":
    case "both-wrong-order":
      return result.path32;
    case "not-found":
      return "";
  }
}

export function composeMessage(
  catalog: MessageCatalog,
  classification: AuditClassification,
  result: AuditResult,
  searchPath: string,
): string {
  return (
    catalog[CLASSIFICATION_MESSAGES[classification]] +
    relevantPath(classification, result) +
    formatTemplate(catalog.explanation, SDKPATH_VERSION) +
    formatTemplate(catalog.systemPath, searchPath)
  );
}

export function resultsEqual(a: AuditResult, b: AuditResult): boolean {
  return (
    a.has32 === b.has32 &&
    a.has64 === b.has64 &&
    a.has64First === b.has64First &&
    a.path32 === b.path32 &&
    a.path64 === b.path64
  );
}

// ============================================================================
// Auditor
// ============================================================================

export type StoreOperation = "load" | "save";

export interface SdkPathAuditorOptions {
  store: AuditResultStore;
  /** Catalog language for calls without a forced language */
  language?: LanguageTag;
  showPositiveMessages?: boolean;
  sdkFolderMarker?: string;
  /** Store failures are not fatal; they are reported here instead */
  onStoreError?: (operation: StoreOperation, error: unknown) => void;
}

export class SdkPathAuditor {
  private store: AuditResultStore;
  private language: LanguageTag;
  private showPositiveMessages: boolean;
  private sdkFolderMarker: string;
  private onStoreError?: (operation: StoreOperation, error: unknown) => void;

  constructor(opts: SdkPathAuditorOptions) {
    this.store = opts.store;
    this.language = opts.language ?? DEFAULT_LANGUAGE;
    this.showPositiveMessages = opts.showPositiveMessages ?? false;
    this.sdkFolderMarker = opts.sdkFolderMarker ?? DEFAULT_SDK_FOLDER_MARKER;
    this.onStoreError = opts.onStoreError;
  }

  /**
   * Run one audit. `forceLanguage` applies to this call only.
   */
  audit(
    searchPath: string | undefined,
    volumeRoots: readonly VolumeRoot[],
    forceLanguage?: LanguageTag,
  ): AuditOutcome {
    const rawPath = searchPath ?? "";
    const result = scanSearchPath(rawPath, volumeRoots, this.sdkFolderMarker);

    if (resultsEqual(result, this.loadPrevious())) {
      return { kind: "unchanged", result };
    }

    this.persist(result);

    const classification = classifyResult(result);
    const severity = severityOf(classification);
    const displayed = severity !== "pass" || this.showPositiveMessages;
    const catalog = getCatalog(forceLanguage ?? this.language);

    return {
      kind: "changed",
      result,
      classification,
      severity,
      displayed,
      message: displayed ? composeMessage(catalog, classification, result, rawPath) : null,
    };
  }

  private loadPrevious(): AuditResult {
    try {
      return this.store.load() ?? EMPTY_AUDIT_RESULT;
    } catch (error) {
      this.onStoreError?.("load", error);
      return EMPTY_AUDIT_RESULT;
    }
  }

  private persist(result: AuditResult): void {
    try {
      this.store.save(result);
    } catch (error) {
      this.onStoreError?.("save", error);
    }
  }
}
