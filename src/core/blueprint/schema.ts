/**
 * Zod schema for blueprint manifests (`blueprint.yaml`).
 */
import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must start with a letter or underscore and contain only letters, digits and underscores');

/** `when:` source: an expression string or a plain boolean. */
export const PredicateSourceSchema = z.union([z.string().min(1), z.boolean()]);

export const VariableTypeSchema = z.enum(['str', 'bool', 'choice']);

/** A list of values, or a map of label → value. */
export const ChoicesSchema = z.union([
  z.array(z.string()).min(1),
  z.record(z.string(), z.string()).refine((map) => Object.keys(map).length > 0, 'must not be empty'),
]);

export const DefaultSchema = z.union([
  z.string(),
  z.boolean(),
  z.object({ template: z.string() }).strict(),
  z.object({ random: z.union([IdentifierSchema, z.array(z.string()).min(1)]) }).strict(),
]);

export const ConstraintSchema = z.union([
  z.enum(['non_empty', 'email', 'slug']),
  z.object({ pattern: z.string().min(1) }).strict(),
]);

export const VariableSpecSchema = z
  .object({
    type: VariableTypeSchema.default('str'),
    help: z.string().optional(),
    choices: ChoicesSchema.optional(),
    default: DefaultSchema.optional(),
    when: PredicateSourceSchema.optional(),
    validate: ConstraintSchema.optional(),
    secret: z.boolean().default(false),
  })
  .strict();

export const FileRuleSchema = z
  .object({
    path: z.string().min(1),
    when: PredicateSourceSchema,
  })
  .strict();

/** Blueprint settings. Every field has a default. */
export const SettingsSchema = z.object({
  /** Directory holding the template corpus, relative to the manifest */
  template_dir: z.string().default('template'),
  /** Files ending in this suffix are rendered and lose it; others are copied verbatim */
  template_suffix: z.string().default('.tmpl'),
  /** Answers file written into the destination */
  answers_file: z.string().default('.blueprint-answers.yml'),
  /** Corpus paths never materialized */
  exclude: z.array(z.string()).default([]),
  /** Output paths left untouched when they already exist */
  skip_if_exists: z.array(z.string()).default([]),
});

export const ManifestSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  settings: withDefaults(SettingsSchema),
  lists: z.record(IdentifierSchema, z.array(z.string()).min(1)).default({}),
  variables: z
    .record(IdentifierSchema, VariableSpecSchema)
    .superRefine((variables, ctx) => {
      for (const name of Object.keys(variables)) {
        if (name.startsWith('_')) {
          ctx.addIssue({
            code: 'custom',
            path: [name],
            message: `'${name}' is reserved: variable names may not start with an underscore`,
          });
        }
      }
    })
    .default({}),
  files: z.array(FileRuleSchema).default([]),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type BlueprintSettings = z.infer<typeof SettingsSchema>;
export type VariableSpec = z.infer<typeof VariableSpecSchema>;
export type FileRuleSpec = z.infer<typeof FileRuleSchema>;
