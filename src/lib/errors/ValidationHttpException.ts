import { HttpException, HttpStatus } from '@nestjs/common';

export interface ValidationIssue {
  path: string;
  message: string;
  constraint?: string;
}

/** The parts of a class-validator error the 400 body reports. */
export interface ConstraintFailure {
  property: string;
  constraints?: Record<string, string>;
  children?: ConstraintFailure[];
}

/** Flatten nested class-validator errors into dotted paths. */
export function toValidationIssues(
  errors: readonly ConstraintFailure[],
  parent = '',
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const e of errors) {
    const path = parent ? `${parent}.${e.property}` : e.property;
    for (const [constraint, message] of Object.entries(e.constraints ?? {})) {
      issues.push({ path, message, constraint });
    }
    if (e.children && e.children.length > 0) {
      issues.push(...toValidationIssues(e.children, path));
    }
  }
  return issues;
}

/** 400 body for a REST request that fails DTO validation. */
export class ValidationHttpException extends HttpException {
  constructor(readonly details: ValidationIssue[]) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'ValidationError',
        message: 'Validation failed',
        details,
      },
      HttpStatus.BAD_REQUEST,
    );
    this.name = 'ValidationHttpException';
  }
}
