/**
 * JSON Schema Validator Service
 *
 * Schema validation for configuration input using ajv.
 *
 * All validators share one Ajv instance, which keeps the compiled function of
 * every schema object it has seen. schemaCache maps each schemaId to the schema
 * it was first compiled from, so an id cannot silently switch schemas.
 */

import Ajv, { ErrorObject, Schema } from 'ajv';
import { ILogger, scopedLogger } from './utils/ILogger';

export type ValidationResult<T> =
  | { valid: true; value: T; errors: string[] }
  | { valid: false; errors: string[] };

const sharedAjv = new Ajv({
  allErrors: true, // Collect all errors, not just the first one
  strict: true,
  validateSchema: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
  verbose: true,
});

const schemaCache: Map<string, Schema> = new Map();

export class JSONSchemaValidator {
  private ajv: Ajv = sharedAjv;
  private logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = scopedLogger(logger, 'JSONSchemaValidator');
  }

  /**
   * Validate data against a JSON schema, narrowing it to T on success
   */
  validate<T>(data: unknown, schema: Schema, schemaId?: string): ValidationResult<T> {
    try {
      if (schemaId !== undefined && !this.cacheSchema(schemaId, schema)) {
        this.logger.error('JSON schema id reused for a different schema', { schemaId });
        return { valid: false, errors: [`Schema validation error: ${schemaId} is already bound to another schema`] };
      }
      // Compiles on first sight of this schema object, returns the stored function afterwards
      const validate = this.ajv.compile<T>(schema);

      if (validate(data)) {
        this.logger.debug('JSON schema validation passed', { schemaId });
        return { valid: true, value: data, errors: [] };
      }

      const errors = this.formatErrors(validate.errors || []);
      this.logger.warn('JSON schema validation failed', {
        schemaId,
        errorCount: errors.length,
        errors,
      });
      return { valid: false, errors };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown validation error';
      this.logger.error('JSON schema validation exception', {
        schemaId,
        error: errorMessage,
      });
      return { valid: false, errors: [`Schema validation error: ${errorMessage}`] };
    }
  }

  /**
   * Clear the schemaId bindings (useful for testing or when schemas change)
   */
  clearCache(): void {
    for (const schema of schemaCache.values()) {
      if (typeof schema === 'object') {
        this.ajv.removeSchema(schema);
      }
    }
    schemaCache.clear();
    this.logger.debug('JSON schema cache cleared');
  }

  /**
   * Get cache statistics
   */
  getCacheStats(): { size: number; schemas: string[] } {
    return {
      size: schemaCache.size,
      schemas: Array.from(schemaCache.keys()),
    };
  }

  /**
   * Bind schemaId to schema on first use; false when the id is bound to another schema
   */
  private cacheSchema(schemaId: string, schema: Schema): boolean {
    const cached = schemaCache.get(schemaId);
    if (cached === undefined) {
      schemaCache.set(schemaId, schema);
      return true;
    }
    return cached === schema;
  }

  /**
   * Format validation errors for readability
   */
  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((error) => {
      const path = error.instancePath || 'root';
      const message = error.message || 'Validation error';

      let formatted = `${path}: ${message}`;
      const params = Object.entries(error.params)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ');
      if (params) {
        formatted += ` (${params})`;
      }
      return formatted;
    });
  }
}
