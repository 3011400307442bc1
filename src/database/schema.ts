/**
 * Column encodings shared by the repositories.
 */

/**
 * Store a vector as a Float32 BLOB (4 bytes per dimension).
 *
 * @example
 * ```ts
 * db.prepare('INSERT INTO vectors (embedding, ...) VALUES (?, ...)').run(embeddingToBlob(vec));
 * ```
 */
export function embeddingToBlob(embedding: Float32Array | number[]): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Copy a BLOB back into a Float32Array. Copies rather than aliasing because
 * the Buffer may not be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.length);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.length / 4));
}

/**
 * Current time as an ISO string, the format used in TEXT timestamp columns.
 */
export function isoNow(): string {
  return new Date().toISOString();
}
