import { z } from 'zod';

export const DotlinkConfigSchema = z
  .object({
    templateDir: z.string().min(1),
    buildDir: z.string().min(1),
    linkDir: z.string().min(1),
    variablesPath: z.string().min(1),
    flags: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type DotlinkConfig = z.infer<typeof DotlinkConfigSchema>;

// Values a variables file may bind
export const VariableValueSchema = z.union([z.string(), z.boolean()]);

export type BindingValue = z.infer<typeof VariableValueSchema>;
