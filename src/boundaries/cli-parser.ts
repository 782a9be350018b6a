import {
  ANALYZE_OPTIONS_SCHEMA,
  VALIDATE_CONFIG_OPTIONS_SCHEMA,
  type AnalyzeOptions,
  type ValidateConfigOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseAnalyzeOptions(raw: unknown): AnalyzeOptions {
  try {
    return ANALYZE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid analyze options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Analyze option parsing');
    throw new ValidationError(`Analyze option parsing failed: ${err.message}`);
  }
}

export function parseValidateConfigOptions(raw: unknown): ValidateConfigOptions {
  try {
    return VALIDATE_CONFIG_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid validate-config options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Validate-config option parsing');
    throw new ValidationError(`Validate-config option parsing failed: ${err.message}`);
  }
}
