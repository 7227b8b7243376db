/**
 * Schema Validator Service
 * Validates signals and sandbox configuration against their JSON schemas.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { SignalSchema, SignalWire } from '../schemas/signal';
import { SandboxConfigSchema, SandboxConfigWire } from '../schemas/sandbox-config';

export interface SchemaValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export type SchemaValidationResult<T> =
  | { valid: true; errors: []; value: T }
  | { valid: false; errors: SchemaValidationError[] };

export class SchemaValidator {
  private ajv: Ajv;
  private validateSignalSchema: ValidateFunction<SignalWire>;
  private validateSandboxConfigSchema: ValidateFunction<SandboxConfigWire>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, discriminator: true });
    this.validateSignalSchema = this.ajv.compile<SignalWire>(SignalSchema);
    this.validateSandboxConfigSchema = this.ajv.compile<SandboxConfigWire>(SandboxConfigSchema);
  }

  /**
   * Converts AJV errors to our SchemaValidationError format
   */
  private convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
    if (!errors) return [];

    return errors.map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'Unknown validation error',
      keyword: error.keyword,
      params: { ...error.params }
    }));
  }

  validateSignal(input: unknown): SchemaValidationResult<SignalWire> {
    if (this.validateSignalSchema(input)) {
      return { valid: true, errors: [], value: input };
    }
    return { valid: false, errors: this.convertErrors(this.validateSignalSchema.errors) };
  }

  validateSandboxConfig(input: unknown): SchemaValidationResult<SandboxConfigWire> {
    if (this.validateSandboxConfigSchema(input)) {
      return { valid: true, errors: [], value: input };
    }
    return { valid: false, errors: this.convertErrors(this.validateSandboxConfigSchema.errors) };
  }
}

/**
 * Shared validator instance (schemas compile once)
 */
export const schemaValidator = new SchemaValidator();
