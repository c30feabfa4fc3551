/**
 * Library Configuration
 *
 * Process-wide defaults for decoding. Every decode entry point also accepts
 * per-call options that take precedence over these. Encoding reads none of
 * them: the bytes of a circuit never depend on configuration.
 */

import type { FieldConfig, FieldName } from './types.js';
import { invalidConfigError } from './errors.js';
import { getFieldConfig, SUPPORTED_FIELDS } from './field/config.js';

/**
 * Global library configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'circuit-ir';
 *
 * configure({
 *   field: 'bn254',
 *   validateWitnessBounds: true,
 * });
 * ```
 */
export interface CircuitIrConfig {
  /** Field decoded elements belong to (default: 'bn254') */
  field?: FieldName;
  /** Reject a MemoryOp whose block has no earlier MemoryInit (default: true) */
  validateMemoryBlocks?: boolean;
  /** Reject witnesses at or above currentWitnessIndex (default: false) */
  validateWitnessBounds?: boolean;
  /** Reject expressions that are not in canonical form (default: false) */
  validateExpressions?: boolean;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

const DEFAULT_CONFIG: Required<CircuitIrConfig> = {
  field: 'bn254',
  validateMemoryBlocks: true,
  validateWitnessBounds: false,
  validateExpressions: false,
  debug: false,
};

// Global configuration state
let globalConfig: Required<CircuitIrConfig> = { ...DEFAULT_CONFIG };

/**
 * Check configuration values, throwing INVALID_CONFIG for the first bad one
 */
export function validateConfig(config: CircuitIrConfig): void {
  if (config.field !== undefined && !SUPPORTED_FIELDS.includes(config.field)) {
    throw invalidConfigError('field', config.field, [...SUPPORTED_FIELDS]);
  }
}

/**
 * Configure global library settings
 *
 * @param config - Configuration options to set
 *
 * @example
 * ```typescript
 * configure({
 *   validateMemoryBlocks: false, // Leave block ordering to the solver
 *   debug: true,
 * });
 * ```
 */
export function configure(config: CircuitIrConfig): void {
  validateConfig(config);
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current library configuration
 *
 * @returns Current configuration settings
 */
export function getConfig(): Readonly<Required<CircuitIrConfig>> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

/**
 * Field used when a caller does not name one
 */
export function getDefaultField(): FieldConfig {
  return getFieldConfig(globalConfig.field);
}

/**
 * Whether debug output is enabled through configuration or the environment
 *
 * The environment switch is `DEBUG` containing 'circuit-ir', or
 * `CIRCUIT_IR_DEBUG` set to '1' or 'true'.
 */
export function isDebugEnabled(): boolean {
  const debugEnv = process.env['DEBUG'];
  const irDebugEnv = process.env['CIRCUIT_IR_DEBUG'];
  return (
    globalConfig.debug ||
    debugEnv?.includes('circuit-ir') === true ||
    irDebugEnv === '1' ||
    irDebugEnv === 'true'
  );
}
