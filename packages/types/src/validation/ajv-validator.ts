/**
 * AJV-based JSON Schema validation for the ledger output document.
 */

import AjvModule from 'ajv';
import ajvFormats from 'ajv-formats';
import type { LedgerOutput } from '../types/output.js';

// Both packages are CommonJS; under ESM the default import is `module.exports`.
const Ajv = AjvModule.default;
const addFormats = ajvFormats.default;

const SCHEMA = {
  "$schema": "http://json-schema.org/draft-07/schema#",
  "$id": "https://example.local/schemas/ledger-output.schema.json",
  "title": "Canonical Statement Ledger Output",
  "type": "object",
  "additionalProperties": false,
  "required": ["schemaVersion", "source", "method", "ledger", "summary", "metadata"],
  "properties": {
    "schemaVersion": { "const": "1.0.0" },
    "source": {
      "type": "object",
      "additionalProperties": false,
      "required": ["fileName", "fileType"],
      "properties": {
        "fileName": { "type": "string", "minLength": 1 },
        "fileType": { "enum": ["pdf", "csv"] }
      }
    },
    "method": { "type": "string", "minLength": 1 },
    "ledger": {
      "type": "array",
      "items": { "$ref": "#/definitions/transaction" }
    },
    "summary": { "$ref": "#/definitions/summary" },
    "metadata": {
      "type": "object",
      "additionalProperties": false,
      "required": ["parser", "parsedAt", "warnings"],
      "properties": {
        "parser": {
          "type": "object",
          "additionalProperties": false,
          "required": ["name", "version"],
          "properties": {
            "name": { "type": "string", "minLength": 1 },
            "version": { "type": "string", "minLength": 1 }
          }
        },
        "parsedAt": { "type": "string", "format": "date-time" },
        "warnings": { "type": "array", "items": { "type": "string" } }
      }
    }
  },
  "definitions": {
    "isoDate": { "type": "string", "format": "date" },
    "transaction": {
      "type": "object",
      "additionalProperties": false,
      "required": ["date", "description", "amount", "type"],
      "properties": {
        "date": { "$ref": "#/definitions/isoDate" },
        "description": { "type": "string" },
        "amount": { "type": "number" },
        "type": { "enum": ["Credit", "Debit"] }
      }
    },
    "monthlyBreakdown": {
      "type": "object",
      "additionalProperties": false,
      "required": ["month", "credits", "debits", "count"],
      "properties": {
        "month": { "type": "string", "pattern": "^\\d{4}-\\d{2}$" },
        "credits": { "type": "number", "minimum": 0 },
        "debits": { "type": "number", "minimum": 0 },
        "count": { "type": "integer", "minimum": 0 }
      }
    },
    "summary": {
      "type": "object",
      "additionalProperties": false,
      "required": [
        "totalTransactions",
        "startDate",
        "endDate",
        "daysCovered",
        "monthsCovered",
        "monthlyBreakdown",
        "totalCredits",
        "totalDebits",
        "dateFormatDetected"
      ],
      "properties": {
        "totalTransactions": { "type": "integer", "minimum": 0 },
        "startDate": { "anyOf": [{ "$ref": "#/definitions/isoDate" }, { "type": "null" }] },
        "endDate": { "anyOf": [{ "$ref": "#/definitions/isoDate" }, { "type": "null" }] },
        "daysCovered": { "type": "integer", "minimum": 0 },
        "monthsCovered": { "type": "integer", "minimum": 1 },
        "monthlyBreakdown": { "type": "array", "items": { "$ref": "#/definitions/monthlyBreakdown" } },
        "totalCredits": { "type": "number", "minimum": 0 },
        "totalDebits": { "type": "number", "minimum": 0 },
        "dateFormatDetected": { "type": "string" }
      }
    }
  }
};

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

type LedgerValidateFunction = ReturnType<InstanceType<typeof Ajv>['compile']>;

let compiledValidator: LedgerValidateFunction | null = null;

function getValidator(): LedgerValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({
      allErrors: true,
      verbose: true,
    });
    addFormats(ajv);
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

export function validateLedgerOutput(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateLedgerOutputOrThrow(output: unknown): asserts output is LedgerOutput {
  const result = validateLedgerOutput(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
