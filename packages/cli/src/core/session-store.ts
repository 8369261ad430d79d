/**
 * Session Store: where the previous audit result lives between runs.
 *
 * One YAML document per shell session at ~/.sdkpath/sessions/<id>.yaml.
 * The session is the parent process (the shell that launched sdkpath) unless
 * SDKPATH_SESSION names one explicitly, so results survive re-invocation
 * from the same shell and are discarded once that shell exits.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as yamlParse, stringify as yamlStringify, YAMLParseError } from "yaml";
import { z } from "zod";
import { auditResultSchema, type AuditResult, type AuditResultStore } from "@sdkpath/core";
import { SESSIONS_DIR, isErrnoException, mkdirp, readFileIfExists } from "./fs-helpers.js";

// ============================================================================
// Types
// ============================================================================

const sessionDocumentSchema = z.object({
  pid: z.number().int(),
  updatedAt: z.string(),
  result: auditResultSchema,
});

export type SessionDocument = z.infer<typeof sessionDocumentSchema>;

// ============================================================================
// Session Identity
// ============================================================================

/**
 * Resolve the session id: an explicit SDKPATH_SESSION wins (reduced to
 * filename-safe characters), otherwise the parent process id.
 */
export function resolveSessionId(
  env: NodeJS.ProcessEnv = process.env,
  parentPid: number = process.ppid,
): string {
  const explicit = env.SDKPATH_SESSION?.replace(/[^\w.-]/g, "");
  return explicit ? explicit : String(parentPid);
}

export function sessionFilePath(sessionId: string, dir: string = SESSIONS_DIR): string {
  return path.join(dir, `${sessionId}.yaml`);
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === "EPERM";
  }
}

// ============================================================================
// Stores
// ============================================================================

export class MemoryResultStore implements AuditResultStore {
  private result: AuditResult | null = null;

  load(): AuditResult | null {
    return this.result ? { ...this.result } : null;
  }

  save(result: AuditResult): void {
    this.result = { ...result };
  }

  clear(): void {
    this.result = null;
  }
}

export class FileResultStore implements AuditResultStore {
  constructor(
    readonly filePath: string,
    private ownerPid: number = process.ppid,
  ) {}

  /** The stored document, or null when absent or not a valid session record. */
  read(): SessionDocument | null {
    const content = readFileIfExists(this.filePath);
    if (content === null) return null;
    return parseSessionDocument(content);
  }

  load(): AuditResult | null {
    return this.read()?.result ?? null;
  }

  save(result: AuditResult): void {
    mkdirp(path.dirname(this.filePath));
    const doc: SessionDocument = {
      pid: this.ownerPid,
      updatedAt: new Date().toISOString(),
      result: { ...result },
    };
    fs.writeFileSync(this.filePath, yamlStringify(doc), "utf-8");
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}

export function parseSessionDocument(content: string): SessionDocument | null {
  let raw: unknown;
  try {
    raw = yamlParse(content);
  } catch (error) {
    if (error instanceof YAMLParseError) return null;
    throw error;
  }
  const parsed = sessionDocumentSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Remove session files whose owning process has exited. Files that cannot
 * be parsed are removed too. Returns the removed file names.
 */
export function pruneStaleSessions(
  dir: string = SESSIONS_DIR,
  isAlive: (pid: number) => boolean = isProcessAlive,
): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return [];
    throw error;
  }

  const removed: string[] = [];
  for (const name of names) {
    if (!name.endsWith(".yaml")) continue;
    const filePath = path.join(dir, name);
    const content = readFileIfExists(filePath);
    if (content === null) continue;

    const doc = parseSessionDocument(content);
    if (doc && isAlive(doc.pid)) continue;

    fs.rmSync(filePath, { force: true });
    removed.push(name);
  }
  return removed;
}
