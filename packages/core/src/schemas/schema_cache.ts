import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";

/**
 * Singleton cache for compiled schema validators, so each schema is
 * compiled by AJV once per process.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject): ValidateFunction<T> {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached as ValidateFunction<T>;
    }

    const validator = this.getAjv().compile<T>(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number } {
    return { cachedSchemas: this.schemaValidators.size };
  }
}
