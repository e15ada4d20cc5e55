import { ArgumentsHost } from '@nestjs/common';
import { ValidationError } from 'class-validator';

export type FormattedErrors = Record<string, string[]>;

/**
 * Flattens nested class-validator errors into `{ 'a.b': [messages] }`.
 */
export const formatValidationErrors = (
  errors: ValidationError[],
): FormattedErrors => {
  const result: FormattedErrors = {};

  const walk = (errs: ValidationError[], parentPath = ''): void => {
    errs.forEach((error: ValidationError) => {
      const path = parentPath
        ? `${parentPath}.${error.property}`
        : error.property;

      if (error.constraints) {
        result[path] = Object.values(error.constraints);
      }

      if (error.children?.length) {
        walk(error.children, path);
      }
    });
  };

  walk(errors);

  return result;
};

/** Body of every 400 produced by request validation. */
export const validationResponseBody = (
  _host: ArgumentsHost,
  _exception: unknown,
  formattedErrors: object,
): Record<string, unknown> => ({
  success: false,
  errors: formattedErrors,
});
