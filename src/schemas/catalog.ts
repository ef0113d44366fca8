import { z } from 'zod';

export const CategorySchema = z.enum([
  'Subjective term',
  'Weak modality',
  'Undefined reference',
  'Non-testable statement',
  'Environment assumption',
  'Data assumption',
  'State assumption'
]);

export const TriggerSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('literal'), phrases: z.array(z.string().trim().min(1)).min(1) }),
  z.object({ type: z.literal('lemma'), phrases: z.array(z.string().trim().min(1)).min(1) }),
  z.object({ type: z.literal('regex'), pattern: z.string().min(1), flags: z.string().regex(/^[imsu]*$/).optional() })
]);

export const RuleSchema = z.object({
  id: z.string().min(1),
  category: CategorySchema,
  trigger: TriggerSchema,
  weight: z.number().positive().finite(),
  message: z.string().min(1),
  impact: z.string().min(1).optional(),
  questions: z.record(z.string().min(1)).refine(q => 'default' in q, { message: 'questions must include a "default" template' }),
  suppressWhen: z.enum(['quantified', 'antecedent']).optional(),
  satisfiedBy: z.object({
    trigger: TriggerSchema,
    scope: z.enum(['preceding', 'sentence', 'text']).default('preceding')
  }).optional()
});

export const CatalogFileSchema = z.object({
  version: z.string().min(1),
  quantifierPattern: z.string().min(1),
  statementTypes: z.array(z.object({
    type: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1)
  })).default([]),
  rules: z.array(RuleSchema).min(1)
});

export type TriggerSpec = z.infer<typeof TriggerSchema>;
export type RuleSpec = z.infer<typeof RuleSchema>;
export type CatalogFile = z.infer<typeof CatalogFileSchema>;
