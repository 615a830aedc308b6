/**
 * Payload Validator
 * Validates upstream API responses against JSON schemas before they are
 * mapped into the domain model. A payload that does not match is rejected,
 * never patched up.
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { ProviderError } from '../types/market-data-error';

export class PayloadValidator {
  private ajv: Ajv;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
  }

  compile<T>(schema: SchemaObject): ValidateFunction<T> {
    return this.ajv.compile<T>(schema);
  }

  /**
   * Return the payload typed as T, or throw MALFORMED_PAYLOAD with the
   * failing field paths
   */
  assert<T>(validate: ValidateFunction<T>, payload: unknown, sourceId: string, context: string): T {
    if (validate(payload)) {
      return payload;
    }
    throw new ProviderError(
      'MALFORMED_PAYLOAD',
      `Malformed ${context} payload from ${sourceId}: ${this.describeErrors(validate.errors)}`,
      sourceId
    );
  }

  private describeErrors(errors: ErrorObject[] | null | undefined): string {
    if (!errors || errors.length === 0) return 'unknown validation error';
    return errors
      .map(error => `${error.instancePath || '/'} ${error.message || 'is invalid'}`)
      .join(', ');
  }
}

export const payloadValidator = new PayloadValidator();
