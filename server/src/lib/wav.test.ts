import { describe, it, expect } from "vitest";

import { decodeWav, encodeWav, floatToInt16 } from "./wav.js";

function floatWav(samples: number[], sampleRate: number, extraChunk?: Buffer): Buffer {
  const data = Buffer.alloc(samples.length * 4);
  samples.forEach((sample, index) => data.writeFloatLE(sample, index * 4));

  const fmt = Buffer.alloc(24);
  fmt.write("fmt ", 0);
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(3, 8);
  fmt.writeUInt16LE(1, 10);
  fmt.writeUInt32LE(sampleRate, 12);
  fmt.writeUInt32LE(sampleRate * 4, 16);
  fmt.writeUInt16LE(4, 20);
  fmt.writeUInt16LE(32, 22);

  const dataHeader = Buffer.alloc(8);
  dataHeader.write("data", 0);
  dataHeader.writeUInt32LE(data.length, 4);

  const body = Buffer.concat([fmt, extraChunk ?? Buffer.alloc(0), dataHeader, data]);
  const riff = Buffer.alloc(12);
  riff.write("RIFF", 0);
  riff.writeUInt32LE(4 + body.length, 4);
  riff.write("WAVE", 8);
  return Buffer.concat([riff, body]);
}

describe("floatToInt16", () => {
  it("scales and clamps to the 16-bit range", () => {
    expect(floatToInt16(1)).toBe(32767);
    expect(floatToInt16(-1)).toBe(-32768);
    expect(floatToInt16(0.5)).toBe(16384);
    expect(floatToInt16(2)).toBe(32767);
    expect(floatToInt16(Number.NaN)).toBe(0);
  });
});

describe("encodeWav", () => {
  it("writes a 44-byte PCM header followed by the samples", () => {
    const wav = encodeWav(new Float32Array([0, 0.5, -1]), 24000);

    expect(wav.length).toBe(50);
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(24000);
    expect(wav.readUInt32LE(40)).toBe(6);
    expect(wav.readInt16LE(46)).toBe(16384);
    expect(wav.readInt16LE(48)).toBe(-32768);
  });

  it("rejects a non-positive sample rate", () => {
    expect(() => encodeWav(new Float32Array(1), 0)).toThrow("Invalid sample rate");
  });
});

describe("decodeWav", () => {
  it("reads back 16-bit PCM written by encodeWav", () => {
    const decoded = decodeWav(encodeWav(new Float32Array([0, 0.5, -1]), 16000));

    expect(decoded.sampleRate).toBe(16000);
    expect(Array.from(decoded.samples)).toEqual([0, 0.5, -1]);
  });

  it("reads 32-bit float data and skips unknown chunks", () => {
    // odd-sized chunk plus its pad byte
    const list = Buffer.alloc(12);
    list.write("LIST", 0);
    list.writeUInt32LE(3, 4);

    const decoded = decodeWav(floatWav([0.25, -0.75], 22050, list));

    expect(decoded.sampleRate).toBe(22050);
    expect(Array.from(decoded.samples)).toEqual([0.25, -0.75]);
  });

  it("rejects payloads that are not WAV", () => {
    expect(() => decodeWav(Buffer.from("definitely not audio"))).toThrow("Not a RIFF/WAVE payload");
  });

  it("rejects stereo audio", () => {
    const wav = encodeWav(new Float32Array(4), 8000);
    wav.writeUInt16LE(2, 22);
    expect(() => decodeWav(wav)).toThrow("Expected mono audio, got 2 channels");
  });
});
