import quickpushConfigSchema from "./quickpush_config_schema.json";

export { SchemaValidationCache } from "./schema_cache";

export const Schemas = {
  QuickpushConfig: quickpushConfigSchema,
} as const;
