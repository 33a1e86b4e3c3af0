import { describe, it, expect } from "vitest";
import { collectDrumHits, encodeDrumAudicles, renderDrumSlot } from "./drums.js";
import type { MidiMessage } from "../midi/types.js";

function hit(deltaTime: number, pitch: number, velocity: number, channel = 9): MidiMessage {
  return { kind: "noteOn", deltaTime, channel, pitch, velocity };
}

function off(deltaTime: number, pitch: number, channel = 9): MidiMessage {
  return { kind: "noteOff", deltaTime, channel, pitch };
}

describe("renderDrumSlot", () => {
  it("renders an empty slot as a rest", () => {
    expect(renderDrumSlot([])).toBe("_");
  });

  it("renders a single hit as its accent", () => {
    expect(renderDrumSlot([110])).toBe("^|");
  });

  it("groups several hits in recorded order", () => {
    expect(renderDrumSlot([40, 41, 127])).toBe("{v| *| ^|}");
  });
});

describe("collectDrumHits", () => {
  it("pools hits from every track by pitch", () => {
    const hits = collectDrumHits([
      [hit(0, 36, 100)],
      [{ kind: "noteOn", deltaTime: 0, channel: 0, pitch: 60, velocity: 90 }, hit(240, 36, 50)],
    ]);
    expect([...hits.entries()]).toEqual([
      [36, [{ tick: 0, velocity: 100 }, { tick: 240, velocity: 50 }]],
    ]);
  });

  it("ignores zero-velocity note-ons and note-offs", () => {
    const hits = collectDrumHits([[hit(0, 38, 0), off(10, 38)]]);
    expect(hits.size).toBe(0);
  });
});

describe("encodeDrumAudicles", () => {
  it("renders one audicle per pitch on an eighth-note grid", () => {
    const track = [hit(0, 36, 120), hit(240, 38, 30), hit(0, 38, 100), hit(240, 36, 80)];
    expect(encodeDrumAudicles([track], 480)).toEqual([
      "(^| _ *|)",
      "(_ {v| *|})",
    ]);
  });

  it("orders audicles by ascending pitch, not by first hit", () => {
    const track = [hit(0, 42, 100), hit(240, 35, 100)];
    expect(encodeDrumAudicles([track], 480)).toEqual([
      "(_ *|)",
      "(*|)",
    ]);
  });

  it("pools percussion notes that sit in melodic tracks", () => {
    const drums = [hit(0, 36, 100)];
    const mixed: MidiMessage[] = [
      { kind: "noteOn", deltaTime: 0, channel: 0, pitch: 60, velocity: 90 },
      hit(240, 36, 50),
    ];
    expect(encodeDrumAudicles([drums, mixed], 480)).toEqual(["(*| *|)"]);
  });

  it("trims trailing rests per pitch while sharing the grid length", () => {
    const track = [hit(0, 36, 100), hit(960, 38, 100)];
    expect(encodeDrumAudicles([track], 480)).toEqual([
      "(*|)",
      "(_ _ _ _ *|)",
    ]);
  });

  it("returns nothing without percussion attacks", () => {
    const melodic: MidiMessage[] = [
      { kind: "noteOn", deltaTime: 0, channel: 0, pitch: 60, velocity: 90 },
      { kind: "noteOff", deltaTime: 240, channel: 0, pitch: 60 },
    ];
    expect(encodeDrumAudicles([melodic, [hit(0, 38, 0)]], 480)).toEqual([]);
  });

  it("encodes a single hit", () => {
    expect(encodeDrumAudicles([[hit(0, 38, 80), off(240, 38)]], 480)).toEqual(["(*|)"]);
  });

  it("reads a custom percussion channel", () => {
    const track = [hit(0, 36, 100, 10), hit(0, 38, 100, 9)];
    expect(encodeDrumAudicles([track], 480, 10)).toEqual(["(*|)"]);
  });
});
