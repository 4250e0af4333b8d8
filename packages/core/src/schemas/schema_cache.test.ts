import { SchemaValidationCache } from "./schema_cache";
import { Schemas } from "./index";

describe("SchemaValidationCache", () => {
  beforeEach(() => {
    SchemaValidationCache.clearCache();
  });

  it("[SC-A1] should compile a schema once and reuse the validator", () => {
    const first = SchemaValidationCache.getValidatorFromSchema(Schemas.QuickpushConfig);
    const second = SchemaValidationCache.getValidatorFromSchema(Schemas.QuickpushConfig);

    expect(second).toBe(first);
    expect(SchemaValidationCache.getCacheStats()).toEqual({ cachedSchemas: 1 });
  });

  it("[SC-A2] should validate against the compiled schema", () => {
    const validate = SchemaValidationCache.getValidatorFromSchema(Schemas.QuickpushConfig);

    expect(validate({ remote: "origin", pause: false })).toBe(true);
    expect(validate({ remote: "" })).toBe(false);
  });

  it("[SC-A3] should empty the cache on clearCache", () => {
    SchemaValidationCache.getValidatorFromSchema(Schemas.QuickpushConfig);

    SchemaValidationCache.clearCache();

    expect(SchemaValidationCache.getCacheStats()).toEqual({ cachedSchemas: 0 });
  });
});
