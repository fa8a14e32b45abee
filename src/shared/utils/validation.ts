import type { ZodError, ZodIssue } from 'zod';

/** `path: message`, or the bare message for an issue at the root. */
export function issueMessage(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function firstIssue(error: ZodError): string {
  const [issue] = error.issues;
  return issue ? issueMessage(issue) : 'invalid input';
}
