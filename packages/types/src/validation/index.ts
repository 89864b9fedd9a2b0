export {
  validateLedgerOutput,
  validateLedgerOutputOrThrow,
  formatValidationErrors,
} from './ajv-validator.js';

export type { ValidationResult, ValidationError } from './ajv-validator.js';
