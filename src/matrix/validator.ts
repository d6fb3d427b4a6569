/**
 * Matrix validator.
 *
 * The only validation gate of the pipeline: a malformed target row fails
 * the whole pipeline before any job is created.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { FeatureRule, MatrixDeclaration, TargetDeclaration, ruleMatches } from '../domain/target';
import { REQUIRED_TARGET_FIELDS, SCHEMA_CONSTRAINTS } from './schema';

/** Validation result. */
export interface MatrixValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** Validate a matrix declaration. */
export function validateMatrix(declaration: Partial<MatrixDeclaration>): MatrixValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!Array.isArray(declaration.targets)) {
    errors.push(
      createTypedError({
        code: 'CONFIG.INVALID_MATRIX',
        message: 'Matrix targets must be an array',
        retryable: false,
      }),
    );
    return { valid: false, errors, warnings };
  }

  if (declaration.targets.length === 0) {
    errors.push(
      createTypedError({
        code: 'CONFIG.EMPTY_MATRIX',
        message: 'Matrix must declare at least one target',
        retryable: false,
      }),
    );
  }

  if (declaration.targets.length > SCHEMA_CONSTRAINTS.maxTargets) {
    errors.push(
      createTypedError({
        code: 'CONFIG.TOO_MANY_TARGETS',
        message: `Matrix exceeds maximum of ${SCHEMA_CONSTRAINTS.maxTargets} targets`,
        retryable: false,
      }),
    );
  }

  const rules = declaration.featureRules ?? [];
  declaration.targets.forEach((row, index) => validateTarget(row, index, rules, errors));
  validateImageArchitectures(declaration.imageArchitectures, errors, warnings);

  return { valid: errors.length === 0, errors, warnings };
}

function validateTarget(row: TargetDeclaration, index: number, rules: FeatureRule[], errors: TypedError[]): void {
  if (row === null || typeof row !== 'object') {
    errors.push(
      createTypedError({
        code: 'CONFIG.INVALID_TARGET',
        message: `Target #${index} must be an object`,
        retryable: false,
      }),
    );
    return;
  }

  for (const field of REQUIRED_TARGET_FIELDS) {
    const value = row[field];
    if (typeof value !== 'string' || value.length === 0) {
      errors.push(
        createTypedError({
          code: 'CONFIG.REQUIRED_FIELD',
          message: `Target #${index} is missing required field: ${field}`,
          retryable: false,
          details: { index, field },
          suggestedFixes: [
            { type: 'ADD_FIELD', params: { field }, description: `Provide the "${field}" field` },
          ],
        }),
      );
    } else if (!SCHEMA_CONSTRAINTS.platformPattern.test(value)) {
      errors.push(
        createTypedError({
          code: 'CONFIG.INVALID_FIELD',
          message: `Target #${index} has an invalid ${field}: "${value}"`,
          retryable: false,
          details: { index, field, value },
        }),
      );
    }
  }

  const flags = row.featureSet ?? [];
  if (!Array.isArray(flags)) {
    errors.push(
      createTypedError({
        code: 'CONFIG.INVALID_FIELD',
        message: `Target #${index} featureSet must be an array of strings`,
        retryable: false,
        details: { index, field: 'featureSet' },
      }),
    );
    return;
  }

  if (flags.length > SCHEMA_CONSTRAINTS.maxFeatureFlags) {
    errors.push(
      createTypedError({
        code: 'CONFIG.TOO_MANY_FEATURES',
        message: `Target #${index} exceeds maximum of ${SCHEMA_CONSTRAINTS.maxFeatureFlags} feature flags`,
        retryable: false,
      }),
    );
  }

  const validFlags: string[] = [];
  for (const flag of flags) {
    if (typeof flag !== 'string' || !SCHEMA_CONSTRAINTS.identifierPattern.test(flag)) {
      errors.push(
        createTypedError({
          code: 'CONFIG.INVALID_FIELD',
          message: `Target #${index} has an invalid feature flag: ${JSON.stringify(flag)}`,
          retryable: false,
          details: { index, field: 'featureSet' },
        }),
      );
    } else {
      validFlags.push(flag);
    }
  }

  const { operatingSystem, cpuArchitecture } = row;
  if (typeof operatingSystem !== 'string' || typeof cpuArchitecture !== 'string') return;

  for (const rule of rules) {
    if (!ruleMatches(rule, operatingSystem, cpuArchitecture)) continue;
    for (const flag of validFlags) {
      if (rule.disallow.includes(flag)) {
        errors.push(
          createTypedError({
            code: 'CONFIG.FEATURE_NOT_ALLOWED',
            message: `Feature "${flag}" is not available on ${operatingSystem}/${cpuArchitecture}`
              + (rule.reason ? `: ${rule.reason}` : ''),
            retryable: false,
            details: { index, flag, operatingSystem, cpuArchitecture },
            suggestedFixes: [
              { type: 'REMOVE_FEATURE', params: { flag }, description: `Remove "${flag}" from target #${index}` },
            ],
          }),
        );
      }
    }
  }
}

function validateImageArchitectures(architectures: unknown, errors: TypedError[], warnings: string[]): void {
  if (architectures === undefined) return;
  if (!Array.isArray(architectures)) {
    errors.push(
      createTypedError({
        code: 'CONFIG.INVALID_FIELD',
        message: 'imageArchitectures must be an array of strings',
        retryable: false,
      }),
    );
    return;
  }
  if (architectures.length === 0) {
    warnings.push('No image architectures declared; no image jobs will be created');
  }
  for (const arch of architectures) {
    if (typeof arch !== 'string' || !SCHEMA_CONSTRAINTS.platformPattern.test(arch)) {
      errors.push(
        createTypedError({
          code: 'CONFIG.INVALID_FIELD',
          message: `Invalid image architecture: ${JSON.stringify(arch)}`,
          retryable: false,
        }),
      );
    }
  }
}
