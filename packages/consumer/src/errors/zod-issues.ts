import type { ZodError } from 'zod';

export interface IssueSummary {
  /** First issue as `path: message`, or the bare message at the root. */
  readonly message: string;
  readonly issues: ReadonlyArray<{ path: string; message: string }>;
}

export function summarizeZodError(error: ZodError): IssueSummary {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const [first] = issues;
  const where = first && first.path !== '' ? `${first.path}: ` : '';
  return { message: `${where}${first?.message ?? 'invalid input'}`, issues };
}
