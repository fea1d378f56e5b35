import fs from "node:fs";

import { parseProperties } from "./properties.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const BOOTSTRAP_CONFIGURATION_KEY =
  "org.springframework.cloud.bootstrap.BootstrapConfiguration";
export const AUTO_CONFIGURATION_KEY =
  "org.springframework.boot.autoconfigure.EnableAutoConfiguration";

// =============================================================================
// TYPES
// =============================================================================

/**
 * The two registration points of a spring.factories file. A key that is absent
 * from the file stays undefined; a key with an empty value is an empty list.
 */
export type RegistrationEntries = {
  bootstrapConfiguration?: string[];
  autoConfiguration?: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function readRegistrationEntries(filePath: string): RegistrationEntries | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  return parseRegistrationEntries(fs.readFileSync(filePath, "utf8"));
}

export function parseRegistrationEntries(text: string): RegistrationEntries {
  const properties = parseProperties(text);
  const entries: RegistrationEntries = {};

  const bootstrap = properties.get(BOOTSTRAP_CONFIGURATION_KEY);
  if (bootstrap !== undefined) {
    entries.bootstrapConfiguration = splitClassList(bootstrap);
  }

  const auto = properties.get(AUTO_CONFIGURATION_KEY);
  if (auto !== undefined) {
    entries.autoConfiguration = splitClassList(auto);
  }

  return entries;
}

export function splitClassList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function registeredClasses(entries: RegistrationEntries): string[] {
  return [...(entries.bootstrapConfiguration ?? []), ...(entries.autoConfiguration ?? [])];
}
