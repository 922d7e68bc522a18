import { ZodError } from 'zod';

export class PlotDataValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PlotDataValidationError';
  }

  static fromZodError(subject: string, error: ZodError): PlotDataValidationError {
    return new PlotDataValidationError(`Invalid ${subject}`, formatZodIssues(error));
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
