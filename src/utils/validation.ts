import { z } from 'zod';
import { ValidationError } from './errors';

export const parseInput = <T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join(', '),
      { issues }
    );
  }
  return parsed.data;
};

export const idParam = z.coerce.number().int().positive();

export const pageQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});
