export {
  validateQuickpushConfigFile,
  isQuickpushConfigFile,
  formatSchemaError,
} from "./config_validator";
export { ConfigValidationError } from "./errors";
