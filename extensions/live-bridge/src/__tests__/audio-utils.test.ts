import { describe, it, expect } from "vitest";
import {
  parseMediaType,
  normalizeInputMediaType,
  isAudioMediaType,
  isVisualMediaType,
  chunkAudio,
  generateTone,
} from "../audio-utils.js";

describe("parseMediaType", () => {
  it("splits essence and parameters", () => {
    expect(parseMediaType("Audio/PCM; Rate=16000")).toEqual({
      essence: "audio/pcm",
      params: { rate: "16000" },
    });
  });

  it("ignores parameters without a name", () => {
    expect(parseMediaType("image/jpeg;=x;quality")).toEqual({ essence: "image/jpeg", params: {} });
  });
});

describe("normalizeInputMediaType", () => {
  it("adds the input rate to bare PCM", () => {
    expect(normalizeInputMediaType("audio/pcm")).toBe("audio/pcm;rate=16000");
  });

  it("keeps an explicit rate", () => {
    expect(normalizeInputMediaType("audio/pcm;rate=8000")).toBe("audio/pcm;rate=8000");
  });

  it("leaves other media alone", () => {
    expect(normalizeInputMediaType("image/png")).toBe("image/png");
  });
});

describe("media classification", () => {
  it("recognizes audio", () => {
    expect(isAudioMediaType("audio/pcm;rate=24000")).toBe(true);
    expect(isAudioMediaType("image/png")).toBe(false);
  });

  it("recognizes images and video", () => {
    expect(isVisualMediaType("image/jpeg")).toBe(true);
    expect(isVisualMediaType("video/webm")).toBe(true);
    expect(isVisualMediaType("audio/pcm")).toBe(false);
  });
});

describe("chunkAudio", () => {
  it("splits into 640-byte frames with a short tail", () => {
    const frames = [...chunkAudio(Buffer.alloc(1500))];
    expect(frames.map((f) => f.length)).toEqual([640, 640, 220]);
  });

  it("yields nothing for an empty buffer", () => {
    expect([...chunkAudio(Buffer.alloc(0))]).toEqual([]);
  });
});

describe("generateTone", () => {
  it("produces two bytes per sample", () => {
    expect(generateTone(16000, 20).length).toBe(640);
  });

  it("starts at zero and carries signal", () => {
    const tone = generateTone(16000, 10, 440, 0.5);
    expect(tone.readInt16LE(0)).toBe(0);
    expect(tone.readInt16LE(10)).not.toBe(0);
  });
});
