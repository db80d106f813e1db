import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

export type ValidationOutcome<T> =
  | { valid: true; value: T }
  | { valid: false; message: string };

/**
 * Build a DTO from plain input and run its class-validator rules.
 * Reports the first constraint message of the first failing property.
 */
export function validateInput<T extends object>(
  dto: ClassConstructor<T>,
  plain: object,
): ValidationOutcome<T> {
  const value = plainToInstance(dto, plain);
  const errors = validateSync(value, { stopAtFirstError: true });

  if (errors.length > 0) {
    return { valid: false, message: firstMessage(errors[0]) };
  }

  return { valid: true, value };
}

function firstMessage(error: ValidationError): string {
  const messages = Object.values(error.constraints ?? {});
  if (messages.length > 0) return messages[0];

  const [child] = error.children ?? [];
  return child ? firstMessage(child) : `Invalid value for ${error.property}`;
}
