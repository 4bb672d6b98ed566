import { describe, it, expect } from "vitest";
import { envSchema } from "./env.js";

describe("envSchema", () => {
  it("should apply defaults for an empty environment", () => {
    const env = envSchema.parse({});

    expect(env.AUDIT_GEOMETRY_BACKENDS).toEqual(["freecad", "openscad"]);
    expect(env.AUDIT_SIDECAR_EXTENSION).toBe(".base");
    expect(env.AUDIT_ISOLATE_FAILURES).toBe(false);
    expect(env.AUDIT_REPORT_PATH).toBeUndefined();
  });

  it("should split and trim the geometry backend pair", () => {
    const env = envSchema.parse({
      AUDIT_GEOMETRY_BACKENDS: "openscad, freecad",
      AUDIT_ISOLATE_FAILURES: "true",
      AUDIT_REPORT_PATH: "/tmp/audit.txt",
    });

    expect(env.AUDIT_GEOMETRY_BACKENDS).toEqual(["openscad", "freecad"]);
    expect(env.AUDIT_ISOLATE_FAILURES).toBe(true);
    expect(env.AUDIT_REPORT_PATH).toBe("/tmp/audit.txt");
  });

  it("should reject anything but exactly two geometry backends", () => {
    expect(
      envSchema.safeParse({ AUDIT_GEOMETRY_BACKENDS: "freecad" }).success,
    ).toBe(false);
    expect(
      envSchema.safeParse({ AUDIT_GEOMETRY_BACKENDS: "a,b,c" }).success,
    ).toBe(false);
  });

  it("should reject a sidecar extension without a leading dot", () => {
    expect(
      envSchema.safeParse({ AUDIT_SIDECAR_EXTENSION: "base" }).success,
    ).toBe(false);
  });

  it("should reject a non-boolean isolation flag", () => {
    expect(
      envSchema.safeParse({ AUDIT_ISOLATE_FAILURES: "yes" }).success,
    ).toBe(false);
  });
});
