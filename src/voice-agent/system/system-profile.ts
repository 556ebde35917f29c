/**
 * System Profile
 *
 * One-line description of the host (OS, distribution, desktop) embedded in
 * every command prompt. Computed once at startup.
 */

import { readFileSync } from "node:fs";
import os from "node:os";

/**
 * Parse os-release(5) KEY=value lines
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;

    const key = line.slice(0, eq);
    let value = line.slice(eq + 1);
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }

  return fields;
}

export interface HostFacts {
  platform: NodeJS.Platform;
  /** Parsed /etc/os-release, when readable */
  osRelease?: Record<string, string>;
  env: Record<string, string | undefined>;
  osType: string;
}

/**
 * Format the profile string from host facts
 */
export function formatSystemProfile(facts: HostFacts): string {
  switch (facts.platform) {
    case "linux": {
      const name = facts.osRelease?.NAME || "Linux";
      const version = facts.osRelease?.VERSION_ID || "";
      const desktop = facts.env.XDG_CURRENT_DESKTOP || facts.env.DESKTOP_SESSION || "Unknown DE";
      const distro = [name, version].filter((part) => part.length > 0).join(" ");
      return `Linux (${distro}, ${desktop})`;
    }
    case "darwin":
      return "Darwin";
    case "win32":
      return "Windows";
    default:
      return facts.osType;
  }
}

function readOsRelease(): Record<string, string> | undefined {
  for (const candidate of ["/etc/os-release", "/usr/lib/os-release"]) {
    try {
      return parseOsRelease(readFileSync(candidate, "utf-8"));
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Describe the current host
 */
export function detectSystemProfile(override?: string): string {
  if (override && override.trim().length > 0) {
    return override.trim();
  }

  return formatSystemProfile({
    platform: process.platform,
    osRelease: process.platform === "linux" ? readOsRelease() : undefined,
    env: process.env,
    osType: os.type(),
  });
}
