import type { ErrorObject } from "ajv";
import { SchemaValidationCache } from "../schemas/schema_cache";
import { Schemas } from "../schemas";
import type { QuickpushConfigFile } from "../config_manager/config_manager.types";
import { ConfigValidationError } from "./errors";

/**
 * Formats an AJV error as "<path> <message>", with "(root)" for the top level.
 */
export function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath || "(root)";
  const detail = error.message ?? "is invalid";
  const extra: unknown = error.params["additionalProperty"];
  return typeof extra === "string"
    ? `${location} ${detail} (${extra})`
    : `${location} ${detail}`;
}

export function isQuickpushConfigFile(data: unknown): data is QuickpushConfigFile {
  const validate = SchemaValidationCache.getValidatorFromSchema<QuickpushConfigFile>(Schemas.QuickpushConfig);
  return validate(data);
}

/**
 * @param source - shown in the error message, usually the file path
 * @throws ConfigValidationError listing every schema violation
 */
export function validateQuickpushConfigFile(data: unknown, source: string): QuickpushConfigFile {
  const validate = SchemaValidationCache.getValidatorFromSchema<QuickpushConfigFile>(Schemas.QuickpushConfig);
  if (validate(data)) {
    return data;
  }
  throw new ConfigValidationError(source, (validate.errors ?? []).map(formatSchemaError));
}
