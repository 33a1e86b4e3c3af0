import { describe, it, expect } from "vitest";
import { convertPerformance } from "./convert.js";
import type { MidiMessage, Performance } from "../midi/types.js";

function on(deltaTime: number, pitch: number, velocity = 100, channel = 0): MidiMessage {
  return { kind: "noteOn", deltaTime, channel, pitch, velocity };
}

function off(deltaTime: number, pitch: number, channel = 0): MidiMessage {
  return { kind: "noteOff", deltaTime, channel, pitch };
}

function performance(tracks: MidiMessage[][], ticksPerBeat = 480): Performance {
  return { ticksPerBeat, tracks };
}

describe("convertPerformance", () => {
  it("writes a lone drum hit twice", () => {
    const result = convertPerformance(performance([[on(0, 38, 80, 9), off(240, 38, 9)]]));
    expect(result.document).toBe("(*|)\n(*|)");
    expect(result.drumAudicles).toEqual(["(*|)"]);
    expect(result.melodicAudicles).toEqual([]);
  });

  it("reports an empty file", () => {
    expect(convertPerformance(performance([])).document).toBe("// No tracks found.");
  });

  it("reports tracks without note events as empty", () => {
    const result = convertPerformance(performance([[{ kind: "meta", deltaTime: 0 }], []]));
    expect(result.document).toBe("// No tracks found.");
  });

  it("writes a single melodic track without envelope", () => {
    const result = convertPerformance(performance([[on(0, 60), off(480, 60)]]));
    expect(result.document).toBe("*C4 - - -*");
  });

  it("assembles drums and melodic tracks in order", () => {
    const result = convertPerformance(performance([
      [on(0, 60), off(480, 60)],
      [on(0, 36, 100, 9)],
      [on(0, 69), off(120, 69)],
    ]));
    expect(result.document).toBe(["`~#", "‘", "(*|)", "*C4 - - -*", "*A4*", "‘"].join("\n"));
    expect(result.trackCount).toBe(3);
    expect(result.percussionTrackCount).toBe(1);
    expect(result.ticksPerBeat).toBe(480);
  });

  it("skips a track with any channel-9 message as melodic", () => {
    const track: MidiMessage[] = [{ kind: "channel", deltaTime: 0, channel: 9 }, on(0, 60), off(120, 60)];
    const result = convertPerformance(performance([track]));
    expect(result.document).toBe("// No tracks found.");
    expect(result.percussionTrackCount).toBe(1);
  });

  it("is deterministic", () => {
    const input = performance([
      [on(0, 64), on(0, 60), off(240, 64), off(0, 60)],
      [on(0, 42, 30, 9), on(0, 42, 120, 9), on(240, 36, 100, 9)],
    ]);
    expect(convertPerformance(input).document).toBe(convertPerformance(input).document);
  });

  describe("options", () => {
    it("reads drums from a custom percussion channel", () => {
      const input = performance([[on(0, 60, 100, 9), off(120, 60, 9)]]);
      expect(convertPerformance(input).document).toBe("(*|)\n(*|)");
      expect(convertPerformance(input, { percussionChannel: 10 }).document).toBe("*C4*");
    });

    it("cuts the preview to the configured length", () => {
      const input = performance([[on(0, 38, 80, 9)]]);
      expect(convertPerformance(input, { previewLength: 5 }).preview).toBe("(*|)\n...");
      expect(convertPerformance(input).preview).toBe("(*|)\n(*|)");
    });

    it("rejects an out-of-range percussion channel", () => {
      expect(() => convertPerformance(performance([]), { percussionChannel: 16 })).toThrow();
    });
  });

  describe("resolution", () => {
    it("rejects zero ticks per beat", () => {
      expect(() => convertPerformance(performance([], 0))).toThrow("Invalid resolution: 0 ticks per beat");
    });

    it("rejects resolutions too small for the melodic grid", () => {
      const input = performance([[on(0, 60), off(3, 60)]], 3);
      expect(() => convertPerformance(input)).toThrow(
        "Invalid resolution: 3 ticks per beat (the melodic grid needs at least 4)",
      );
    });

    it("encodes drums at resolutions too small for the melodic grid", () => {
      const result = convertPerformance(performance([[on(0, 38, 80, 9)]], 2));
      expect(result.document).toBe("(*|)\n(*|)");
    });

    it("rejects a drum hit when the eighth-note grid has no ticks", () => {
      expect(() => convertPerformance(performance([[on(0, 38, 80, 9)]], 1))).toThrow(
        "Invalid resolution: 1 ticks per beat (the drum grid needs at least 2)",
      );
    });

    it("rejects a melodic track at resolution 3 even when drums fit", () => {
      const input = performance([[on(0, 36, 100, 9)], [on(0, 60), off(3, 60)]], 3);
      expect(() => convertPerformance(input)).toThrow("the melodic grid needs at least 4");
    });

    it("accepts any positive resolution when no notes need a grid", () => {
      expect(convertPerformance(performance([[{ kind: "meta", deltaTime: 0 }]], 1)).document)
        .toBe("// No tracks found.");
    });

    it("rejects fractional resolutions", () => {
      expect(() => convertPerformance(performance([], 480.5))).toThrow("Invalid resolution");
    });

    it("accepts the smallest usable resolution", () => {
      const result = convertPerformance(performance([[on(0, 60), off(4, 60)]], 4));
      expect(result.document).toBe("*C4 - - -*");
    });
  });
});
