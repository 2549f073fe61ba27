import { FormatMismatchError, InvalidInputError } from "../errors.js";
import { encodeWav } from "../lib/wav.js";
import type { AssembledAudio, SynthesizedSegment } from "../types/audio.js";
import type { CrossFadeCurve } from "../config/env.js";

export type AssembleOptions = {
  crossFadeSeconds: number;
  minTargetSeconds: number;
  curve?: CrossFadeCurve;
};

/**
 * Stitches index-ordered segments into one track. Adjacent segments overlap
 * by the cross-fade window (clamped to the shorter segment) and the overlap
 * is the weighted sum of both sides. Short results are padded with trailing
 * silence up to `minTargetSeconds`.
 */
export function assemble(
  segments: readonly SynthesizedSegment[],
  options: AssembleOptions,
): AssembledAudio {
  if (segments.length === 0) {
    throw new InvalidInputError("No segments to assemble");
  }

  const sampleRate = segments[0].sampleRate;
  const mismatch = segments.find((segment) => segment.sampleRate !== sampleRate);
  if (mismatch) {
    throw new FormatMismatchError(
      `Chunk ${mismatch.chunkIndex} has sample rate ${mismatch.sampleRate}, expected ${sampleRate}`,
    );
  }

  const fadeSamples = Math.max(0, Math.round(options.crossFadeSeconds * sampleRate));
  const gains = options.curve === "equal-power" ? equalPowerGains : linearGains;

  const fades: number[] = [];
  let totalLength = segments[0].samples.length;
  for (let index = 1; index < segments.length; index += 1) {
    const fade = Math.min(
      fadeSamples,
      segments[index - 1].samples.length,
      segments[index].samples.length,
    );
    fades.push(fade);
    totalLength += segments[index].samples.length - fade;
  }

  const minSamples = Math.ceil(Math.max(0, options.minTargetSeconds) * sampleRate);
  const output = new Float32Array(Math.max(totalLength, minSamples));

  output.set(segments[0].samples, 0);
  let cursor = segments[0].samples.length;
  for (let index = 1; index < segments.length; index += 1) {
    const right = segments[index].samples;
    const fade = fades[index - 1];
    const overlapStart = cursor - fade;

    for (let k = 0; k < fade; k += 1) {
      const t = fade === 1 ? 0.5 : k / (fade - 1);
      const [leftGain, rightGain] = gains(t);
      output[overlapStart + k] = output[overlapStart + k] * leftGain + right[k] * rightGain;
    }

    output.set(right.subarray(fade), cursor);
    cursor = overlapStart + right.length;
  }

  const data = encodeWav(output, sampleRate);
  return {
    samples: output,
    sampleRate,
    durationSeconds: output.length / sampleRate,
    format: "wav",
    data,
    sizeBytes: data.length,
  };
}

function linearGains(t: number): [number, number] {
  return [1 - t, t];
}

function equalPowerGains(t: number): [number, number] {
  return [Math.cos((t * Math.PI) / 2), Math.sin((t * Math.PI) / 2)];
}
