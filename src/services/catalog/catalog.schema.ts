import { z } from 'zod';
import { RISK_LEVELS } from '../../domain/entities/Requirement.js';

export const requirementSchema = z.object({
  requirementId: z.string().trim().min(1),
  title: z.string().trim().min(1),
  text: z.string().trim().min(1),
  sectionRef: z.string().default(''),
  riskLevel: z.enum(RISK_LEVELS).default('MEDIUM'),
});

export const frameworkFileSchema = z
  .object({
    frameworkId: z.string().min(1),
    name: z.string().nullable().default(null),
    version: z.string().nullable().default(null),
    effectiveDate: z.string().nullable().default(null),
    requirements: z.array(requirementSchema),
  })
  .superRefine((framework, ctx) => {
    const seen = new Set<string>();
    framework.requirements.forEach((requirement, index) => {
      if (seen.has(requirement.requirementId)) {
        ctx.addIssue({
          code: 'custom',
          path: ['requirements', index, 'requirementId'],
          message: `Duplicate requirement id ${requirement.requirementId}`,
        });
      }
      seen.add(requirement.requirementId);
    });
  });

export type FrameworkFile = z.infer<typeof frameworkFileSchema>;
