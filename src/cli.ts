#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { stringifyHstoreJson } from "./hstore/hstoreJson.js";
import { renderHstoreLiteral, renderQuotedHstoreLiteral } from "./hstore/literal.js";
import { emit, formatHexBytes, loadHstore, parseInputFormat } from "./hstore/tool.js";
import type { LoadOptions } from "./hstore/tool.js";
import { encodeHstore } from "./hstore/wire.js";

const program = new Command();

function warnToStderr(msg: string): void {
  console.warn(msg);
}

program
  .name("hstoretools")
  .description("PostgreSQL hstore tools (binary wire format <-> JSON, inline literals)")
  .version("0.1.0");

program
  .command("to-json")
  .description("Convert hstore wire bytes to JSON")
  .argument("<input>", "Path to a file holding one binary hstore value")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .option("--hex", "Input is hex text (as printed by psql for bytea)", false)
  .action(async (input: string, opts: { output?: string; hex: boolean }) => {
    const map = await loadHstore(input, { format: "wire", hex: opts.hex }, warnToStderr);
    await emit(stringifyHstoreJson(map), opts.output);
  });

program
  .command("from-json")
  .description("Convert a JSON object of strings to hstore wire bytes")
  .argument("<input>", "Path to JSON file")
  .requiredOption("-o, --output <path>", "Write the encoded value to this path")
  .option("--hex", "Write hex text instead of raw bytes", false)
  .action(async (input: string, opts: { output: string; hex: boolean }) => {
    const map = await loadHstore(input, { format: "json" }, warnToStderr);
    const bytes = encodeHstore(map);
    await emit(opts.hex ? formatHexBytes(bytes) + "\n" : bytes, opts.output);
  });

program
  .command("literal")
  .description("Render an hstore value as an inline SQL literal")
  .argument("<input>", "Path to .json, .txt (hstore text) or binary file")
  .option("--from <format>", "Input format: json|wire|text (default: by extension)")
  .option("--hex", "Wire input is hex text", false)
  .option("--quoted", "Quote and escape keys and values", false)
  .action(async (input: string, opts: { from?: string; hex: boolean; quoted: boolean }) => {
    const load: LoadOptions =
      opts.from !== undefined ? { format: parseInputFormat(opts.from), hex: opts.hex } : { hex: opts.hex };
    const map = await loadHstore(input, load, warnToStderr);
    const text = opts.quoted ? renderQuotedHstoreLiteral(map) : renderHstoreLiteral(map);
    process.stdout.write(text + "\n");
  });

program
  .command("parse-text")
  .description("Convert hstore text output (\"k\"=>\"v\", ...) to JSON")
  .argument("<input>", "Path to a text file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .action(async (input: string, opts: { output?: string }) => {
    const map = await loadHstore(input, { format: "text" }, warnToStderr);
    await emit(stringifyHstoreJson(map), opts.output);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
