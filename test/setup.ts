import { afterEach, beforeEach } from "vitest";

import { CONFIG_ENV_VAR } from "../src/core/config-discovery.js";

// =============================================================================
// CONFIG ENV ISOLATION
// =============================================================================

// A developer's own BUILDWARDEN_CONFIG must not leak into config discovery tests.
let savedConfigEnv: string | undefined;

beforeEach(() => {
  savedConfigEnv = process.env[CONFIG_ENV_VAR];
  delete process.env[CONFIG_ENV_VAR];
});

afterEach(() => {
  if (savedConfigEnv === undefined) {
    delete process.env[CONFIG_ENV_VAR];
  } else {
    process.env[CONFIG_ENV_VAR] = savedConfigEnv;
  }
});
