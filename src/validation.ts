/**
 * Validation utilities using TypeBox.
 *
 * Wire payloads are checked against compiled schemas before they reach
 * subscribers.
 */

import type { Static, TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
  /** Parse JSON text, then validate */
  parse: (text: string) => T;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator.
 */
export function compileSchema<S extends TSchema>(schema: S): CompiledValidator<Static<S>> {
  const compiled = Compile(schema);

  const validate = (value: unknown): Static<S> => {
    if (compiled.Check(value)) {
      return value;
    }
    throw new ValidationError(formatErrors(compiled.Errors(value)));
  };

  return {
    check: (value: unknown): value is Static<S> => compiled.Check(value),

    validate,

    parse: (text: string): Static<S> => {
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch (err) {
        throw new ValidationError(`/: ${err instanceof Error ? err.message : String(err)}`, {
          cause: err,
        });
      }
      return validate(value);
    },
  };
}
