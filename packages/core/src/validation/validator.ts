import { z } from 'zod';

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface SchemaValidationResult<T> {
  valid: boolean;
  errors?: ValidationIssue[];
  data?: T;
}

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  expected?: string;
  received?: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
    expected: 'expected' in issue ? String(issue.expected) : undefined,
    received: 'received' in issue ? String(issue.received) : undefined,
  }));
}

export function validateSchema<T>(schema: Schema<T>, data: unknown): SchemaValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { valid: true, data: result.data };
  }

  return { valid: false, errors: toValidationIssues(result.error) };
}

export function isValidSchema<T>(schema: Schema<T>, data: unknown): boolean {
  return schema.safeParse(data).success;
}

export class SchemaValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const message = issues.map((e) => `${e.field || '(root)'}: ${e.message}`).join('; ');
    super(`Schema validation failed: ${message}`);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

export function validateOrThrow<T>(schema: Schema<T>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(toValidationIssues(result.error));
  }
  return result.data;
}
