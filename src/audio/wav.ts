import { open } from 'fs/promises';
import { FormatError } from '../errors.js';

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const HEADER_PROBE_BYTES = 64 * 1024;

export const PCM16_HEADER_SIZE = 44;

export interface WavLayout {
  format: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  dataOffset: number;
  dataLength: number;
}

// RIFF size fields are 32-bit and count the 36 header bytes after them
export const MAX_WAV_DATA_BYTES = 0xffffffff - 36;

/** 44-byte RIFF header for mono 16-bit PCM. */
export function createWavHeader(dataLength: number, sampleRate: number): Buffer {
  if (!Number.isInteger(dataLength) || dataLength < 0 || dataLength > MAX_WAV_DATA_BYTES) {
    throw new FormatError(`WAV data of ${dataLength} bytes does not fit a RIFF header`);
  }
  const header = Buffer.alloc(PCM16_HEADER_SIZE);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataLength, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataLength, 40);
  return header;
}

export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const buffer = Buffer.alloc(PCM16_HEADER_SIZE + samples.length * 2);
  createWavHeader(samples.length * 2, sampleRate).copy(buffer, 0);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i] ?? 0));
    buffer.writeInt16LE(Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff), PCM16_HEADER_SIZE + i * 2);
  }

  return buffer;
}

/**
 * Locates the fmt and data chunks of a RIFF/WAVE buffer. A data chunk whose
 * declared size runs past the end (streamed output) is clamped to what is there.
 */
export function parseWavLayout(buf: Buffer, totalLength = buf.length): WavLayout {
  if (buf.length < 12 || buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new FormatError('Not a RIFF/WAVE stream');
  }

  let fmt: Omit<WavLayout, 'dataOffset' | 'dataLength'> | null = null;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (body + 16 > buf.length) break;
      let format = buf.readUInt16LE(body);
      if (format === WAVE_FORMAT_EXTENSIBLE && size >= 26 && body + 26 <= buf.length) {
        format = buf.readUInt16LE(body + 24);
      }
      fmt = {
        format,
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14)
      };
    } else if (id === 'data') {
      if (!fmt) throw new FormatError('WAV data chunk precedes its fmt chunk');
      const available = totalLength - body;
      // size 0 is written by encoders that stream without seeking back
      return { ...fmt, dataOffset: body, dataLength: size === 0 ? available : Math.min(size, available) };
    }

    // chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw new FormatError('WAV stream has no data chunk');
}

/** Decodes PCM (8/16/24/32-bit) or float WAV into mono samples in [-1, 1]. */
export function decodeWav(buf: Buffer): { samples: Float32Array; sampleRate: number } {
  const layout = parseWavLayout(buf);
  const { channels, bitsPerSample, format } = layout;
  const bytesPerSample = bitsPerSample / 8;

  if (channels < 1 || !Number.isInteger(bytesPerSample) || bytesPerSample < 1) {
    throw new FormatError(`Unsupported WAV layout: ${channels} channel(s), ${bitsPerSample} bits`);
  }
  if (format !== WAVE_FORMAT_PCM && !(format === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32)) {
    throw new FormatError(`Unsupported WAV encoding (format tag ${format}, ${bitsPerSample} bits)`);
  }

  const read = sampleReader(format, bitsPerSample);
  const frameSize = bytesPerSample * channels;
  const frames = Math.floor(layout.dataLength / frameSize);
  const samples = new Float32Array(frames);

  for (let frame = 0; frame < frames; frame++) {
    const base = layout.dataOffset + frame * frameSize;
    let sum = 0;
    for (let channel = 0; channel < channels; channel++) {
      sum += read(buf, base + channel * bytesPerSample);
    }
    samples[frame] = sum / channels;
  }

  return { samples, sampleRate: layout.sampleRate };
}

function sampleReader(format: number, bitsPerSample: number): (buf: Buffer, offset: number) => number {
  if (format === WAVE_FORMAT_IEEE_FLOAT) return (buf, offset) => buf.readFloatLE(offset);

  switch (bitsPerSample) {
    case 8:
      return (buf, offset) => (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return (buf, offset) => buf.readInt16LE(offset) / 0x8000;
    case 24:
      return (buf, offset) => buf.readIntLE(offset, 3) / 0x800000;
    case 32:
      return (buf, offset) => buf.readInt32LE(offset) / 0x80000000;
    default:
      throw new FormatError(`Unsupported PCM bit depth: ${bitsPerSample}`);
  }
}

/** Decodes raw little-endian 16-bit mono PCM. */
export function decodePcm16(data: Uint8Array): Float32Array {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const samples = new Float32Array(Math.floor(data.byteLength / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = view.getInt16(i * 2, true) / 0x8000;
  }
  return samples;
}

/** Reads only the header of a WAV file on disk. */
export async function readWavLayout(filePath: string): Promise<WavLayout> {
  const handle = await open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const probe = Buffer.alloc(Math.min(size, HEADER_PROBE_BYTES));
    await handle.read(probe, 0, probe.length, 0);
    return parseWavLayout(probe, size);
  } finally {
    await handle.close();
  }
}
