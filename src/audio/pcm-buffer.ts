const INT16_MIN = -32768;
const INT16_MAX = 32767;

/**
 * Pads `chunk` with zero bytes so its length is a multiple of `sampleWidth`.
 */
export function alignToSampleWidth(chunk: Buffer, sampleWidth: number): Buffer {
  const remainder = chunk.length % sampleWidth;
  if (remainder === 0) {
    return chunk;
  }
  return Buffer.concat([chunk, Buffer.alloc(sampleWidth - remainder)]);
}

/**
 * Gain applied for a volume percentage: 100 is unity, 0 is silence.
 */
export function volumeFactor(volumePercentage: number): number {
  return Math.pow(2, volumePercentage / 100) - 1;
}

/**
 * Scales little-endian signed 16-bit samples. `chunk` must already be aligned.
 */
export function scaleInt16(chunk: Buffer, factor: number): Buffer {
  if (factor === 1) {
    return chunk;
  }
  const scaled = Buffer.alloc(chunk.length);
  for (let offset = 0; offset + 1 < chunk.length; offset += 2) {
    const sample = Math.trunc(chunk.readInt16LE(offset) * factor);
    scaled.writeInt16LE(Math.min(INT16_MAX, Math.max(INT16_MIN, sample)), offset);
  }
  return scaled;
}
