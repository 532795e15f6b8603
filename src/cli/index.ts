#!/usr/bin/env node

/**
 * CLI entry point for the illustration catalogue enricher
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { runCommand } from "./commands/run";
import { statusCommand } from "./commands/status";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("catalog-enrich")
  .description(
    "Translate catalogue records to English and download their images, resumably",
  )
  .version("0.1.0");

// Main enrichment command (default action)
program
  .option("-t, --translate", "Translate records (only)")
  .option("-d, --download", "Download images (only)")
  .option("-r, --retries <count>", "Max retries per record on network or API problems")
  .option("-i, --input <path>", "Source catalogue JSON")
  .option("-o, --output <path>", "Enriched catalogue JSON (also the checkpoint)")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--source-url <url>", "Download the source catalogue from this URL when the input is missing")
  .option("--concurrency <count>", "Records processed in parallel per pass")
  .option("--checkpoint-interval <count>", "Translated records between two saves")
  .option("-v, --verbose", "Verbose output")
  .action(runCommand);

// Status command - pending work without running anything
program
  .command("status")
  .description("Show how many records still need translating or downloading")
  .option("-i, --input <path>", "Source catalogue JSON")
  .option("-o, --output <path>", "Enriched catalogue JSON")
  .option("-c, --config <path>", "Path to custom config file")
  .action(statusCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
