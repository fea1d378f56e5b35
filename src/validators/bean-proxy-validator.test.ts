import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  captureError,
  createTempWorkspace,
  type TempWorkspace,
} from "../__tests__/helpers/temp-workspace.js";
import { MissingProxyDeclarationError } from "../core/errors.js";

import { verifyBeanProxyDeclarations } from "./bean-proxy-validator.js";
import type { SelfInvocationDetector } from "./self-invocation-detector.js";

const PKG_DIR = "src/main/java/com/acme";

function configurationClass(name: string, opts: { annotation?: string; body?: string } = {}) {
  const annotation = opts.annotation ?? "@Configuration";
  const body = opts.body ?? "  @Bean\n  public Clock clock() { return Clock.systemUTC(); }\n";
  return `package com.acme;\n\n${annotation}\npublic class ${name} {\n${body}}\n`;
}

const SELF_INVOKING_BODY = [
  "  @Bean",
  "  public Clock clock() { return Clock.systemUTC(); }",
  "  @Bean",
  "  public Scheduler scheduler() { return new Scheduler(clock()); }",
  "",
].join("\n");

describe("verifyBeanProxyDeclarations", () => {
  let ws: TempWorkspace;

  beforeEach(() => {
    ws = createTempWorkspace("bean-proxy-");
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  function run(
    overrides: {
      detector?: SelfInvocationDetector;
      ignoreDirs?: string[];
      nestedProjectDirs?: string[];
    } = {},
  ) {
    return verifyBeanProxyDeclarations({
      project: ws.project(),
      sourceExtension: "java",
      scanRoot: ".",
      classSuffix: "Configuration",
      ignoreDirs: overrides.ignoreDirs ?? ["build"],
      nestedProjectDirs: overrides.nestedProjectDirs,
      detector: overrides.detector,
    });
  }

  it("fails a configuration class without self-invocation or proxy declaration", () => {
    ws.write({ [`${PKG_DIR}/ClockConfiguration.java`]: configurationClass("ClockConfiguration") });

    const caught = captureError(() => run());

    expect(caught).toBeInstanceOf(MissingProxyDeclarationError);
    if (!(caught instanceof MissingProxyDeclarationError)) return;

    expect(caught.files).toEqual([path.join(ws.root, PKG_DIR, "ClockConfiguration.java")]);
    expect(caught.message).toBe(
      "Configuration class ClockConfiguration.java should be marked with proxyBeanMethods = false",
    );
  });

  it("passes when the explicit declaration is present", () => {
    ws.write({
      [`${PKG_DIR}/ClockConfiguration.java`]: configurationClass("ClockConfiguration", {
        annotation: '@Configuration(value = "clockConfiguration", proxyBeanMethods = false)',
      }),
      [`${PKG_DIR}/TimerConfiguration.java`]: configurationClass("TimerConfiguration", {
        annotation: '@Configuration(value="timerConfiguration",proxyBeanMethods=true)',
      }),
    });

    expect(run()).toEqual({ configuration_classes: 2, self_invoking: 0 });
  });

  it("leaves self-invoking configuration classes alone", () => {
    ws.write({
      [`${PKG_DIR}/SchedulingConfiguration.java`]: configurationClass("SchedulingConfiguration", {
        body: SELF_INVOKING_BODY,
      }),
    });

    expect(run()).toEqual({ configuration_classes: 1, self_invoking: 1 });
  });

  it("only inspects marked files whose name ends with the suffix", () => {
    ws.write({
      [`${PKG_DIR}/ClockConfig.java`]: configurationClass("ClockConfig"),
      [`${PKG_DIR}/PropertiesConfiguration.java`]: configurationClass("PropertiesConfiguration", {
        annotation: "@Component",
      }),
      [`${PKG_DIR}/ClockConfiguration.kt`]: configurationClass("ClockConfiguration"),
    });

    expect(run()).toEqual({ configuration_classes: 0, self_invoking: 0 });
  });

  it("skips ignored directories", () => {
    ws.write({ [`build/generated/ClockConfiguration.java`]: configurationClass("ClockConfiguration") });

    expect(run()).toEqual({ configuration_classes: 0, self_invoking: 0 });
    expect(() => run({ ignoreDirs: [] })).toThrowError(MissingProxyDeclarationError);
  });

  it("leaves the classes of nested projects to those projects", () => {
    ws.write({
      [`${PKG_DIR}/App.java`]: "package com.acme;\n\npublic class App {\n}\n",
      "sub/src/main/java/com/acme/sub/SubConfiguration.java": configurationClass("SubConfiguration"),
    });

    expect(run({ nestedProjectDirs: [path.join(ws.root, "sub"), ws.root] })).toEqual({
      configuration_classes: 0,
      self_invoking: 0,
    });
    expect(() => run()).toThrowError(MissingProxyDeclarationError);
  });

  it("lists every offending file in path order", () => {
    ws.write({
      [`${PKG_DIR}/web/WebConfiguration.java`]: configurationClass("WebConfiguration"),
      [`${PKG_DIR}/AuditConfiguration.java`]: configurationClass("AuditConfiguration"),
    });

    const caught = captureError(() => run());

    expect(caught).toBeInstanceOf(MissingProxyDeclarationError);
    if (!(caught instanceof MissingProxyDeclarationError)) return;

    expect(caught.files.map((file) => path.basename(file))).toEqual([
      "AuditConfiguration.java",
      "WebConfiguration.java",
    ]);
    expect(caught.message).toBe(
      "Configuration class AuditConfiguration.java should be marked with proxyBeanMethods = false" +
        " (and 1 more: WebConfiguration.java)",
    );
  });

  it("delegates self-invocation detection to the injected detector", () => {
    ws.write({ [`${PKG_DIR}/ClockConfiguration.java`]: configurationClass("ClockConfiguration") });
    const detector: SelfInvocationDetector = {
      detect: () => ({ methods: ["clock"], selfInvoked: ["clock"] }),
    };

    expect(run({ detector })).toEqual({ configuration_classes: 1, self_invoking: 1 });
  });
});
