import { z } from "zod";

export const VMConfigSchema = z.object({
  maxDepth: z.number().int().min(1).default(1500),
});

export type VMConfig = z.infer<typeof VMConfigSchema>;

export const DEFAULT_VM_CONFIG: VMConfig = VMConfigSchema.parse({});

export const OutputFormatSchema = z.enum(["json", "toon"]);

export const GenerateOptionsSchema = z.object({
  width: z.number().int().positive().default(400),
  height: z.number().int().positive().default(400),
  count: z.number().int().positive().default(1),
  seed: z.string().min(1).optional(),
  maxDepth: z.number().int().min(1).default(DEFAULT_VM_CONFIG.maxDepth),
  out: z.string().optional(),
  project: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type GenerateOptions = z.infer<typeof GenerateOptionsSchema>;
