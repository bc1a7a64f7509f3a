/**
 * Schema Validator Service
 * Validates untyped data (provider payloads, environment) against JSON schemas
 * and narrows it to the matching TypeScript type.
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

export interface SchemaValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export type SchemaValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: SchemaValidationError[] };

export interface SchemaValidatorOptions {
  /** Convert "42" to 42 etc. where the schema asks for a number */
  coerceTypes?: boolean;
  /** Fill in `default` values for missing properties */
  useDefaults?: boolean;
}

export class SchemaValidator {
  private ajv: Ajv;

  constructor(options: SchemaValidatorOptions = {}) {
    this.ajv = new Ajv({
      allErrors: true,
      allowUnionTypes: true,
      coerceTypes: options.coerceTypes ?? false,
      useDefaults: options.useDefaults ?? false
    });
  }

  /**
   * Compile a schema into a reusable validator for type T
   */
  compile<T>(schema: SchemaObject): (data: unknown) => SchemaValidationResult<T> {
    const validate: ValidateFunction<T> = this.ajv.compile<T>(schema);

    return (data: unknown) => {
      if (validate(data)) {
        return { valid: true, value: data };
      }
      return { valid: false, errors: convertErrors(validate.errors) };
    };
  }
}

/**
 * Converts AJV errors to our SchemaValidationError format
 */
function convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
  if (!errors) return [];

  return errors.map((error) => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
    keyword: error.keyword,
    params: { ...error.params }
  }));
}

/**
 * One-line summary of validation errors, for logs and error messages
 */
export function formatValidationErrors(errors: SchemaValidationError[]): string {
  return errors.map((error) => `${error.path} ${error.message}`).join('; ');
}

/**
 * Shared validator for provider payloads (no coercion, no defaults)
 */
export const payloadValidator = new SchemaValidator();
