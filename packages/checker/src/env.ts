import { z } from "zod";

export const envSchema = z.object({
  // Checks
  AUDIT_GEOMETRY_BACKENDS: z
    .string()
    .default("freecad,openscad")
    .transform((value) => value.split(",").map((name) => name.trim()))
    .pipe(z.tuple([z.string().min(1), z.string().min(1)])),
  AUDIT_SIDECAR_EXTENSION: z.string().startsWith(".").default(".base"),

  // Engine
  AUDIT_ISOLATE_FAILURES: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),

  // Output
  AUDIT_REPORT_PATH: z.string().min(1).optional(),
});

export const env = envSchema.parse(process.env);
export type Env = z.infer<typeof envSchema>;
