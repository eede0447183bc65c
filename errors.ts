import { ZodError } from 'zod';

export type AnalysisErrorKind =
  | 'MissingCredential'
  | 'InvalidEndpoint'
  | 'TransportFailure'
  | 'MalformedResponse';

export class AnalysisError extends Error {
  readonly kind: AnalysisErrorKind;

  constructor(kind: AnalysisErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalysisError';
    this.kind = kind;
  }
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function describeAnalysisError(error: unknown): string {
  if (!(error instanceof AnalysisError)) {
    return `Failed to generate analysis. Error: ${error instanceof Error ? error.message : String(error)}`;
  }

  switch (error.kind) {
    case 'MissingCredential':
      return `API Key not found. ${error.message}`;
    case 'InvalidEndpoint':
      return `Invalid API URL. ${error.message}`;
    case 'TransportFailure':
      return `Could not reach the analysis service. Error: ${error.message}`;
    case 'MalformedResponse':
      return 'Failed to parse the analysis. Complex punctuation in the verse text, such as quotation marks, ' +
        `can cause this. Please try again.\n\nError: ${error.message}`;
  }
}
