const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const HEADER_SIZE = 44;

export type DecodedWav = {
  samples: Float32Array;
  sampleRate: number;
};

/** Encodes mono float samples as a 16-bit PCM WAV file. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new Error(`Invalid sample rate: ${sampleRate}`);
  }

  const numChannels = 1;
  const bitsPerSample = 16;
  const blockAlign = numChannels * (bitsPerSample / 8);
  const byteRate = sampleRate * blockAlign;
  const dataSize = samples.length * blockAlign;

  const wavBuffer = Buffer.alloc(HEADER_SIZE + dataSize);

  // RIFF header
  wavBuffer.write("RIFF", 0);
  wavBuffer.writeUInt32LE(36 + dataSize, 4);
  wavBuffer.write("WAVE", 8);

  // fmt sub-chunk
  wavBuffer.write("fmt ", 12);
  wavBuffer.writeUInt32LE(16, 16);
  wavBuffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  wavBuffer.writeUInt16LE(numChannels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(bitsPerSample, 34);

  // data sub-chunk
  wavBuffer.write("data", 36);
  wavBuffer.writeUInt32LE(dataSize, 40);

  for (let index = 0; index < samples.length; index += 1) {
    wavBuffer.writeInt16LE(floatToInt16(samples[index]), HEADER_SIZE + index * 2);
  }

  return wavBuffer;
}

export function floatToInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, Number.isNaN(sample) ? 0 : sample));
  return Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff);
}

/**
 * Decodes a mono WAV file (16-bit PCM or 32-bit float) into float samples.
 * Unknown chunks such as LIST are skipped.
 */
export function decodeWav(buffer: Buffer): DecodedWav {
  if (
    buffer.length < 12 ||
    buffer.toString("ascii", 0, 4) !== "RIFF" ||
    buffer.toString("ascii", 8, 12) !== "WAVE"
  ) {
    throw new Error("Not a RIFF/WAVE payload");
  }

  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | undefined;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("ascii", offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt ") {
      let audioFormat = buffer.readUInt16LE(body);
      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26) {
        // first two bytes of the SubFormat GUID carry the real format tag
        audioFormat = buffer.readUInt16LE(body + 24);
      }
      format = {
        audioFormat,
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        bitsPerSample: buffer.readUInt16LE(body + 14),
      };
    } else if (chunkId === "data") {
      if (!format) {
        throw new Error("WAV data chunk precedes fmt chunk");
      }
      if (format.sampleRate === 0) {
        throw new Error("WAV header declares a sample rate of 0");
      }
      const end = Math.min(buffer.length, body + chunkSize);
      return {
        samples: readSamples(buffer.subarray(body, end), format),
        sampleRate: format.sampleRate,
      };
    }

    // chunks are word aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new Error("WAV payload has no data chunk");
}

function readSamples(
  data: Buffer,
  format: { audioFormat: number; channels: number; bitsPerSample: number },
): Float32Array {
  if (format.channels !== 1) {
    throw new Error(`Expected mono audio, got ${format.channels} channels`);
  }

  if (format.audioFormat === WAVE_FORMAT_PCM && format.bitsPerSample === 16) {
    const samples = new Float32Array(Math.floor(data.length / 2));
    for (let index = 0; index < samples.length; index += 1) {
      samples[index] = data.readInt16LE(index * 2) / 0x8000;
    }
    return samples;
  }

  if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT && format.bitsPerSample === 32) {
    const samples = new Float32Array(Math.floor(data.length / 4));
    for (let index = 0; index < samples.length; index += 1) {
      samples[index] = data.readFloatLE(index * 4);
    }
    return samples;
  }

  throw new Error(
    `Unsupported WAV encoding (format ${format.audioFormat}, ${format.bitsPerSample} bits)`,
  );
}
