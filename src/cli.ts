#!/usr/bin/env node
// ─── mida: CLI Entry Point ───────────────────────────────────────────────────
//
// Usage:
//   mida                              # Show help
//   mida convert <file.mid>           # Print the MIDA document
//   mida convert <file.mid> --out song.txt
//   mida convert <file.mid> --percussion-channel 10
//   mida info <file.mid>              # Resolution, tracks, audicle counts
//   mida steps <file.txt>             # Step view of a MIDA document
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { convertMidiFile, type MidaConversion } from "./mida/convert.js";
import { parseMidaDocument } from "./mida/reader.js";
import { renderStepView } from "./mida/steps.js";
import { ConvertOptionsSchema, type ConvertOptions } from "./schemas.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function printSummary(file: string, result: MidaConversion): void {
  const melodicTracks = result.trackCount - result.percussionTrackCount;
  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${file}`);
  console.log(`  Resolution: ${result.ticksPerBeat} ticks per beat`);
  console.log(`  Tracks: ${result.trackCount} (${result.percussionTrackCount} percussion, ${melodicTracks} melodic)`);
  console.log(`  Audicles: ${result.drumAudicles.length} drum, ${result.melodicAudicles.length} melodic`);
  console.log(`${"═".repeat(60)}\n`);
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/** Build conversion options from CLI flags, or exit with a usage error. */
function optionsFromFlags(args: string[]): ConvertOptions {
  const channelStr = getFlag(args, "--percussion-channel");
  const previewStr = getFlag(args, "--preview-length");

  const result = ConvertOptionsSchema.safeParse({
    percussionChannel: channelStr !== null ? Number(channelStr) : undefined,
    previewLength: previewStr !== null ? Number(previewStr) : undefined,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    fail(`Invalid options:\n${issues}`);
  }
  return result.data;
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdConvert(args: string[]): Promise<void> {
  const file = args[0];
  if (!file || file.startsWith("--")) {
    fail("Usage: mida convert <file.mid> [--out <path>] [--percussion-channel N] [--preview-length N] [--quiet]");
  }

  const options = optionsFromFlags(args);
  const outPath = getFlag(args, "--out");
  const result = await convertMidiFile(file, options);

  if (outPath === null) {
    console.log(result.document);
    return;
  }

  await writeFile(outPath, result.document + "\n", "utf8");
  if (hasFlag(args, "--quiet")) return;

  printSummary(file, result);
  console.log(`MIDA written to ${outPath}\n`);
  console.log(`Preview:\n${result.preview}\n`);
}

async function cmdInfo(args: string[]): Promise<void> {
  const file = args[0];
  if (!file || file.startsWith("--")) {
    fail("Usage: mida info <file.mid> [--percussion-channel N]");
  }
  const result = await convertMidiFile(file, optionsFromFlags(args));
  printSummary(file, result);
}

async function cmdSteps(args: string[]): Promise<void> {
  const file = args[0];
  if (!file) {
    fail("Usage: mida steps <file.txt>");
  }
  if (!existsSync(file)) {
    fail(`File not found: "${file}"`);
  }

  const { audicles, warnings } = parseMidaDocument(await readFile(file, "utf8"));
  if (audicles.length === 0) {
    console.log("No audicles found.");
  } else {
    console.log(renderStepView(audicles));
  }

  if (warnings.length > 0) {
    console.error(`\n⚠ ${warnings.length} parse warning(s):`);
    for (const w of warnings.slice(0, 10)) {
      console.error(`  • ${w.location}: "${w.token}" — ${w.message}`);
    }
    if (warnings.length > 10) {
      console.error(`  … and ${warnings.length - 10} more`);
    }
  }
}

function cmdHelp(): void {
  console.log(`
mida — convert MIDI files into MIDA text notation

Commands:
  convert <file.mid>     Print the MIDA document for a MIDI file
    --out <path>           Write the document to a file instead
    --percussion-channel N Channel (0-15) encoded as drums (default: 9)
    --preview-length N     Characters of preview after --out (default: 500)
    --quiet                No summary after --out
  info <file.mid>        Show resolution, track and audicle counts
  steps <file.txt>       Show a MIDA document as a sixteenth-step table
  help                   Show this message
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "convert":
      await cmdConvert(args.slice(1));
      break;
    case "info":
      await cmdInfo(args.slice(1));
      break;
    case "steps":
      await cmdSteps(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'mida help' for usage.`);
  }
}

main().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
