import { z } from "zod";

export const configSchema = z.object({
  specsDir: z.string().default("specs"),
  suffixes: z
    .array(z.string().min(1))
    .min(1)
    .default([".spec.js", ".spec.mjs"]),
  filter: z.string().optional(),
  reportDir: z.string().default(".behaves"),
});

/** What a config file may declare; every field has a default. */
export type BehavesConfig = z.input<typeof configSchema>;

export type ResolvedConfig = z.output<typeof configSchema>;
