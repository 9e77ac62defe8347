import { z } from "zod";

export const RuleSchema = z.object({
  name: z.string().min(1),
  packages: z.string().min(1),
  may_depend: z.array(z.string()).default([]),
  expected: z.array(z.string()).default([])
}).strict();

export const OptionsSchema = z.object({
  working_prefix: z.string().min(1),
  entries: z.array(z.string().min(1)).optional(),
  include_type_imports: z.boolean().optional(),
  include_tests: z.boolean().optional(),
  ignore_imports: z.array(z.string()).optional()
}).strict();

export const RuleFileSchema = z.object({
  options: OptionsSchema,
  rules: z.array(RuleSchema).default([])
}).strict();

export type RuleFile = z.infer<typeof RuleFileSchema>;
export type RuleEntry = z.infer<typeof RuleSchema>;
