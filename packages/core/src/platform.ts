/**
 * Host platform gate. The audit probes drive roots and `Program Files`
 * folders, which only exist on Windows; every entry point checks this
 * before doing any work.
 */

export const TARGET_PLATFORM: NodeJS.Platform = "win32";

export function isTargetPlatform(platform: NodeJS.Platform = process.platform): boolean {
  return platform === TARGET_PLATFORM;
}
