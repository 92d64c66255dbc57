/**
 * Media Type and PCM Helpers
 *
 * The bridge never decodes media; these helpers only read media-type tags
 * and cut or synthesize raw PCM16 buffers for tests and the mock client.
 */

/** Client input rate by convention (mono PCM16) */
export const INPUT_SAMPLE_RATE = 16000;
/** Upstream output rate by convention (mono PCM16) */
export const OUTPUT_SAMPLE_RATE = 24000;

export const DEFAULT_OUTPUT_MEDIA_TYPE = `audio/pcm;rate=${OUTPUT_SAMPLE_RATE}`;

/**
 * Parsed media-type tag.
 */
export interface MediaTypeInfo {
  /** Lowercased "type/subtype" */
  essence: string;
  /** Lowercased parameter names mapped to their values */
  params: Record<string, string>;
}

/**
 * Parse a media-type tag such as "audio/pcm;rate=16000".
 */
export function parseMediaType(mediaType: string): MediaTypeInfo {
  const [head, ...rest] = mediaType.split(";");
  const params: Record<string, string> = {};
  for (const part of rest) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const key = part.slice(0, eq).trim().toLowerCase();
    const value = part.slice(eq + 1).trim();
    if (key) params[key] = value;
  }
  return { essence: (head ?? "").trim().toLowerCase(), params };
}

/**
 * Add the conventional input rate to a bare "audio/pcm" tag.
 * Other tags pass through unchanged.
 */
export function normalizeInputMediaType(mediaType: string): string {
  const { essence, params } = parseMediaType(mediaType);
  if (essence === "audio/pcm" && !params.rate) {
    return `${mediaType.trim()};rate=${INPUT_SAMPLE_RATE}`;
  }
  return mediaType;
}

export function isAudioMediaType(mediaType: string): boolean {
  return parseMediaType(mediaType).essence.startsWith("audio/");
}

export function isVisualMediaType(mediaType: string): boolean {
  const { essence } = parseMediaType(mediaType);
  return essence.startsWith("image/") || essence.startsWith("video/");
}

/**
 * Split audio into fixed-size chunks.
 *
 * @param chunkSize Bytes per chunk (default 640 = 20ms @ 16kHz)
 */
export function* chunkAudio(
  audio: Buffer,
  chunkSize = 640,
): Generator<Buffer, void, unknown> {
  for (let i = 0; i < audio.length; i += chunkSize) {
    yield audio.subarray(i, Math.min(i + chunkSize, audio.length));
  }
}

/**
 * Generate a sine tone as PCM16 mono.
 */
export function generateTone(
  sampleRate: number,
  durationMs: number,
  frequency = 440,
  amplitude = 0.5,
): Buffer {
  const samples = Math.floor((sampleRate * durationMs) / 1000);
  const buffer = Buffer.alloc(samples * 2);

  for (let i = 0; i < samples; i++) {
    const t = i / sampleRate;
    const sample = Math.sin(2 * Math.PI * frequency * t) * 0x7fff * amplitude;
    buffer.writeInt16LE(Math.round(sample), i * 2);
  }

  return buffer;
}
