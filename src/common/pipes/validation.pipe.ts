import { ValidationError, ValidationPipe } from '@nestjs/common';
import { InvalidInputException } from '../exceptions/rag.exceptions';

function flatten(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flatten(error.children ?? []),
  ]);
}

/**
 * ValidationPipe whose failures surface as INVALID_INPUT errors.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: (errors) => new InvalidInputException(flatten(errors).join('; ') || 'Invalid request body.'),
  });
}
