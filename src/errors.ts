/**
 * Error handling for circuit-ir
 *
 * Every failure raised by this library is a CircuitIrError carrying an
 * ErrorCode. Decode failures are terminal: no partially decoded circuit is
 * ever returned.
 */

/**
 * Error codes for encode, decode and validation failures
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  // Wire format errors
  /** The byte stream ended in the middle of a value */
  TRUNCATED_INPUT = 'TRUNCATED_INPUT',
  /** Bytes remain after a complete circuit was read */
  TRAILING_BYTES = 'TRAILING_BYTES',
  /** Top-level opcode discriminant is not known to this decoder */
  UNKNOWN_OPCODE_TAG = 'UNKNOWN_OPCODE_TAG',
  /** Black-box function discriminant is not known to this decoder */
  UNKNOWN_BLACK_BOX_VARIANT = 'UNKNOWN_BLACK_BOX_VARIANT',
  /** Brillig instruction discriminant is not known to this decoder */
  UNKNOWN_BRILLIG_OPCODE_TAG = 'UNKNOWN_BRILLIG_OPCODE_TAG',
  /** Discriminant of any other closed union is not known */
  UNKNOWN_VARIANT_TAG = 'UNKNOWN_VARIANT_TAG',
  /** Field element encoding is not the canonical one */
  NON_CANONICAL_FIELD_ELEMENT = 'NON_CANONICAL_FIELD_ELEMENT',
  /** Option presence flag is neither 0 nor 1 */
  INVALID_OPTION_TAG = 'INVALID_OPTION_TAG',
  /** Length-prefixed text is not valid UTF-8 */
  INVALID_UTF8 = 'INVALID_UTF8',
  /** Memory operation does not describe a read or a write */
  MALFORMED_MEMORY_OP = 'MALFORMED_MEMORY_OP',
  /** Compressed stream header or body is invalid */
  MALFORMED_COMPRESSION_ENVELOPE = 'MALFORMED_COMPRESSION_ENVELOPE',

  // Structural errors (strict decoding)
  /** A witness is not below the circuit's current witness index */
  WITNESS_OUT_OF_RANGE = 'WITNESS_OUT_OF_RANGE',
  /** A memory operation references a block with no earlier MemoryInit */
  UNINITIALIZED_MEMORY_BLOCK = 'UNINITIALIZED_MEMORY_BLOCK',
  /** An expression has unsorted, duplicate or zero-coefficient terms */
  NON_CANONICAL_EXPRESSION = 'NON_CANONICAL_EXPRESSION',

  // Producer and usage errors
  /** An integer does not fit the width it is written with */
  INTEGER_OUT_OF_RANGE = 'INTEGER_OUT_OF_RANGE',
  /** Field elements are from different fields */
  FIELD_MISMATCH = 'FIELD_MISMATCH',
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** Foreign call results were supplied out of call order */
  FOREIGN_CALL_ORDER = 'FOREIGN_CALL_ORDER',

  // I/O errors
  /** The byte sink or source failed */
  IO_ERROR = 'IO_ERROR',
}

/**
 * Base error class for circuit-ir errors
 *
 * @example
 * ```typescript
 * try {
 *   const circuit = decodeCircuit(bytes);
 * } catch (error) {
 *   if (error instanceof CircuitIrError) {
 *     switch (error.code) {
 *       case ErrorCode.UNKNOWN_OPCODE_TAG:
 *         console.error('Produced by a newer encoder:', error.details);
 *         break;
 *       case ErrorCode.TRUNCATED_INPUT:
 *         console.error('Incomplete download:', error.details);
 *         break;
 *     }
 *   }
 * }
 * ```
 */
export class CircuitIrError extends Error {
  /**
   * Create a new CircuitIrError
   *
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   * @param cause - Underlying error, kept for I/O and compression failures
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CircuitIrError';
    Object.setPrototypeOf(this, CircuitIrError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a CircuitIrError
 */
export function isCircuitIrError(error: unknown): error is CircuitIrError {
  return error instanceof CircuitIrError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for a read past the end of the input
 *
 * @param offset - Position the read started at
 * @param needed - Number of bytes the read required
 * @param available - Number of bytes left in the input
 */
export function truncatedInputError(
  offset: number,
  needed: number,
  available: number
): CircuitIrError {
  return new CircuitIrError('Input ended in the middle of a value', ErrorCode.TRUNCATED_INPUT, {
    offset,
    needed,
    available,
  });
}

export function trailingBytesError(offset: number, remaining: number): CircuitIrError {
  return new CircuitIrError(
    `${remaining} unexpected byte(s) after the end of the circuit`,
    ErrorCode.TRAILING_BYTES,
    { offset, remaining }
  );
}

/**
 * Create an error for an unknown top-level opcode discriminant
 */
export function unknownOpcodeTagError(tag: number, offset: number): CircuitIrError {
  return new CircuitIrError(`Unknown opcode tag ${tag}`, ErrorCode.UNKNOWN_OPCODE_TAG, {
    tag,
    offset,
  });
}

/**
 * Create an error for an unknown black-box function discriminant
 */
export function unknownBlackBoxVariantError(tag: number, offset: number): CircuitIrError {
  return new CircuitIrError(
    `Unknown black box function tag ${tag}`,
    ErrorCode.UNKNOWN_BLACK_BOX_VARIANT,
    { tag, offset }
  );
}

export function unknownBrilligOpcodeTagError(tag: number, offset: number): CircuitIrError {
  return new CircuitIrError(
    `Unknown brillig opcode tag ${tag}`,
    ErrorCode.UNKNOWN_BRILLIG_OPCODE_TAG,
    { tag, offset }
  );
}

/**
 * Create an error for an unknown discriminant of a nested union
 *
 * @param type - Name of the union being decoded (e.g. 'RegisterOrMemory')
 * @param tag - The discriminant that was read
 * @param offset - Position of the discriminant
 */
export function unknownVariantTagError(type: string, tag: number, offset: number): CircuitIrError {
  return new CircuitIrError(`Unknown ${type} tag ${tag}`, ErrorCode.UNKNOWN_VARIANT_TAG, {
    type,
    tag,
    offset,
  });
}

/**
 * Create an error for a field element that is not canonically encoded
 *
 * @param value - The offending encoding as text
 * @param reason - What made it non-canonical
 * @param modulus - The field modulus as string
 */
export function nonCanonicalFieldElementError(
  value: string,
  reason: string,
  modulus: string
): CircuitIrError {
  return new CircuitIrError(
    `Non-canonical field element: ${reason}`,
    ErrorCode.NON_CANONICAL_FIELD_ELEMENT,
    { value, reason, modulus }
  );
}

export function invalidOptionTagError(flag: number, offset: number): CircuitIrError {
  return new CircuitIrError(`Invalid option flag ${flag}`, ErrorCode.INVALID_OPTION_TAG, {
    flag,
    offset,
  });
}

export function invalidUtf8Error(offset: number, length: number): CircuitIrError {
  return new CircuitIrError('String is not valid UTF-8', ErrorCode.INVALID_UTF8, {
    offset,
    length,
  });
}

/**
 * Create an error for a memory operation that is neither a read nor a write
 *
 * @param reason - Which part of the operation is malformed
 * @param offset - Position where the memory operation started
 */
export function malformedMemoryOpError(reason: string, offset: number): CircuitIrError {
  return new CircuitIrError(`Malformed memory operation: ${reason}`, ErrorCode.MALFORMED_MEMORY_OP, {
    reason,
    offset,
  });
}

/**
 * Create an error for an invalid compression envelope
 *
 * @param reason - Reason for the failure
 * @param cause - Error reported by the decompressor, if any
 */
export function malformedCompressionEnvelopeError(reason: string, cause?: unknown): CircuitIrError {
  return new CircuitIrError(
    `Malformed compression envelope: ${reason}`,
    ErrorCode.MALFORMED_COMPRESSION_ENVELOPE,
    { reason },
    cause
  );
}

/**
 * Create an error for a witness at or above the current witness index
 *
 * @param witness - The offending witness index
 * @param currentWitnessIndex - Exclusive upper bound declared by the circuit
 * @param location - Where the witness was found (e.g. 'opcodes[3]')
 */
export function witnessOutOfRangeError(
  witness: number,
  currentWitnessIndex: number,
  location: string
): CircuitIrError {
  return new CircuitIrError(
    `Witness ${witness} is not below current witness index ${currentWitnessIndex}`,
    ErrorCode.WITNESS_OUT_OF_RANGE,
    { witness, currentWitnessIndex, location }
  );
}

export function uninitializedMemoryBlockError(blockId: number, opcodeIndex: number): CircuitIrError {
  return new CircuitIrError(
    `Memory block ${blockId} is used before its MemoryInit`,
    ErrorCode.UNINITIALIZED_MEMORY_BLOCK,
    { blockId, opcodeIndex }
  );
}

export function nonCanonicalExpressionError(location: string): CircuitIrError {
  return new CircuitIrError(
    'Expression terms are unsorted, duplicated or have zero coefficients',
    ErrorCode.NON_CANONICAL_EXPRESSION,
    { location }
  );
}

/**
 * Create an error for an integer that does not fit its wire width
 *
 * @param value - The offending value
 * @param width - Wire width, such as 'u32'
 */
export function integerOutOfRangeError(value: number | bigint, width: string): CircuitIrError {
  return new CircuitIrError(
    `Value ${value} does not fit in ${width}`,
    ErrorCode.INTEGER_OUT_OF_RANGE,
    { value: value.toString(), width }
  );
}

/**
 * Create an error for field mismatch
 *
 * @param expected - Expected field name
 * @param actual - Actual field name
 */
export function fieldMismatchError(expected: string, actual: string): CircuitIrError {
  return new CircuitIrError(
    'Field elements must be from the same field',
    ErrorCode.FIELD_MISMATCH,
    { expected, actual }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional list of valid values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown[]
): CircuitIrError {
  const details: Record<string, unknown> = { option, value };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new CircuitIrError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}

export function foreignCallOrderError(reason: string, callIndex: number): CircuitIrError {
  return new CircuitIrError(
    `Foreign call results out of order: ${reason}`,
    ErrorCode.FOREIGN_CALL_ORDER,
    { callIndex }
  );
}

/**
 * Create an error for a failed byte sink or source
 *
 * @param operation - 'read' or 'write'
 * @param cause - The error raised by the sink, source or file system
 * @param path - File path, when the failure came from a file
 */
export function ioError(operation: 'read' | 'write', cause: unknown, path?: string): CircuitIrError {
  const details: Record<string, unknown> = { operation };
  if (path !== undefined) {
    details['path'] = path;
  }
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CircuitIrError(`Failed to ${operation} circuit bytes: ${reason}`, ErrorCode.IO_ERROR, details, cause);
}
