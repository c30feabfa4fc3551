/**
 * Streams and files
 *
 * Failures of the stream or the file system surface as IO_ERROR with the
 * original error attached as `cause`. Format errors in bytes read from a
 * file pass through unchanged.
 */

import { readFile, writeFile } from 'fs/promises';
import type { Writable } from 'stream';
import type { Circuit } from '../circuit/circuit.js';
import { ioError } from '../errors.js';
import { encodeCircuit, decodeCircuit } from './envelope.js';
import type { DecodeOptions } from './decode.js';

/**
 * Encode a circuit and write the envelope to a stream in a single write
 *
 * Resolves once the stream has accepted the chunk. The stream is left open.
 *
 * @example
 * ```typescript
 * await writeCircuit(circuit, socket);
 * ```
 *
 * @throws CircuitIrError IO_ERROR when the stream fails before the write
 *   completes, with the stream's own error as `cause`
 */
export async function writeCircuit(circuit: Circuit, sink: Writable): Promise<void> {
  const envelope = encodeCircuit(circuit);
  try {
    await new Promise<void>((resolve, reject) => {
      // Stays attached after a failure so a late 'error' event is never unhandled
      const onError = (error: Error): void => reject(error);
      sink.once('error', onError);
      sink.write(envelope, (error) => {
        if (error) {
          // A destroyed stream reports a generic error to pending writes
          reject(sink.errored ?? error);
          return;
        }
        sink.off('error', onError);
        resolve();
      });
    });
  } catch (error) {
    throw ioError('write', error);
  }
}

/**
 * Encode a circuit to a file
 */
export async function writeCircuitFile(path: string, circuit: Circuit): Promise<void> {
  const envelope = encodeCircuit(circuit);
  try {
    await writeFile(path, envelope);
  } catch (error) {
    throw ioError('write', error, path);
  }
}

/**
 * Decode a circuit from a file
 */
export async function readCircuitFile(path: string, options?: DecodeOptions): Promise<Circuit> {
  let envelope: Uint8Array;
  try {
    envelope = await readFile(path);
  } catch (error) {
    throw ioError('read', error, path);
  }
  return decodeCircuit(envelope, options);
}
