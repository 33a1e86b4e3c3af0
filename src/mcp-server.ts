#!/usr/bin/env node
// ─── mida: MCP Server ────────────────────────────────────────────────────────
//
// Exposes the MIDI → MIDA converter as MCP tools, so an LLM can turn a MIDI
// file into MIDA text and inspect MIDA documents.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   midi_to_mida — convert a MIDI file to a MIDA document
//   mida_info    — resolution, track and audicle counts for a MIDI file
//   mida_steps   — lay out a MIDA document as a sixteenth-step table
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { convertMidiFile } from "./mida/convert.js";
import { parseMidaDocument } from "./mida/reader.js";
import { renderStepView } from "./mida/steps.js";
import { ConvertOptionsSchema } from "./schemas.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function errorResult(err: unknown) {
  return {
    content: [{ type: "text" as const, text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
    isError: true,
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "mida",
  version: "0.1.0",
});

// ─── Tool: midi_to_mida ─────────────────────────────────────────────────────

server.tool(
  "midi_to_mida",
  "Convert a MIDI file into a MIDA document: one line per drum pitch (eighth-note grid) and per melodic track (sixteenth-note grid).",
  {
    path: z.string().describe("Path to a .mid or .midi file"),
    percussionChannel: ConvertOptionsSchema.shape.percussionChannel.optional()
      .describe("MIDI channel (0-15) written as drum audicles (default: 9)"),
  },
  async ({ path, percussionChannel }) => {
    try {
      const result = await convertMidiFile(path, { percussionChannel });
      return { content: [{ type: "text", text: result.document }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: mida_info ────────────────────────────────────────────────────────

server.tool(
  "mida_info",
  "Summarize how a MIDI file converts to MIDA: resolution, percussion and melodic tracks, audicle counts.",
  {
    path: z.string().describe("Path to a .mid or .midi file"),
    percussionChannel: ConvertOptionsSchema.shape.percussionChannel.optional()
      .describe("MIDI channel (0-15) written as drum audicles (default: 9)"),
  },
  async ({ path, percussionChannel }) => {
    try {
      const result = await convertMidiFile(path, { percussionChannel });
      const text = [
        `# ${path}`,
        `**Resolution:** ${result.ticksPerBeat} ticks per beat`,
        `**Tracks:** ${result.trackCount} (${result.percussionTrackCount} percussion)`,
        `**Drum audicles:** ${result.drumAudicles.length}`,
        `**Melodic audicles:** ${result.melodicAudicles.length}`,
        ``,
        `## Preview`,
        result.preview,
      ].join("\n");
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: mida_steps ───────────────────────────────────────────────────────

server.tool(
  "mida_steps",
  "Lay out a MIDA document as a table with one row per sixteenth step and one column per audicle.",
  {
    document: z.string().describe("MIDA document text"),
  },
  async ({ document }) => {
    const { audicles, warnings } = parseMidaDocument(document);
    if (audicles.length === 0) {
      return {
        content: [{ type: "text", text: "No audicles found in the document." }],
        isError: true,
      };
    }

    const lines = [renderStepView(audicles)];
    if (warnings.length > 0) {
      lines.push(``, `## Warnings`);
      lines.push(...warnings.map(w => `- ${w.location}: "${w.token}" — ${w.message}`));
    }
    return { content: [{ type: "text", text: lines.join("\n") }] };
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("mida MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
