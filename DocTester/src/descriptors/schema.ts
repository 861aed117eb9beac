/**
 * Zod schemas for the YAML descriptors under config/.
 *
 * framework.yaml holds settings shared by every language; languages/<name>.yaml
 * holds one dialect's rule list and rewrite templates.
 */

import { z } from 'zod';

const validationRuleSchema = z
  .object({
    name: z.string().min(1),
    /** Regular expression searched in the raw sample */
    check: z.string().min(1),
    /** true: the pattern must appear. false: its presence fails the rule */
    expected: z.boolean().default(false),
    description: z.string().optional(),
  })
  .superRefine((rule, ctx) => {
    try {
      new RegExp(rule.check);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['check'],
        message: `Invalid pattern for rule "${rule.name}": ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  });

export type ValidationRule = z.infer<typeof validationRuleSchema>;

export const languageDescriptorSchema = z.object({
  language: z.object({
    name: z.string().min(1),
  }),
  /** Falls back to the dialect's default when absent */
  mode: z.enum(['execute', 'analyze']).optional(),
  runtime: z
    .object({
      command: z.string().min(1).optional(),
    })
    .default({}),
  sdk: z
    .object({
      /** Local SDK checkout put on the interpreter's module path */
      path: z.string().optional(),
    })
    .default({}),
  validation_rules: z.array(validationRuleSchema).default([]),
  rewrite: z
    .object({
      required_declarations: z.array(z.string()).default([]),
      project_template: z.string().optional(),
    })
    .default({}),
});

export type LanguageDescriptor = z.infer<typeof languageDescriptorSchema>;

export const frameworkDescriptorSchema = z.object({
  documentation: z
    .object({
      pages_path: z.string().default('.'),
      extensions: z.array(z.string().startsWith('.')).default(['.mdx', '.md']),
    })
    .default({}),
  /** priority name → sample types it covers */
  priority_levels: z.record(z.array(z.string())).default({}),
  mocking: z
    .object({
      api_key_placeholder: z.string().min(1).default('test_key'),
      credential_variables: z.array(z.string().min(1)).default(['DEEPGRAM_API_KEY', 'DEEPGRAM_TOKEN']),
    })
    .default({}),
  execution: z
    .object({
      timeout_seconds: z.number().positive().default(30),
      restore_timeout_seconds: z.number().positive().default(60),
    })
    .default({}),
});

export type FrameworkDescriptor = z.infer<typeof frameworkDescriptorSchema>;
