#!/usr/bin/env node

/**
 * CLI entry point for the COBOL to Java migration pipeline
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { migrateCommand } from "./commands/migrate";
import { analyzeCommand } from "./commands/analyze";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("cobol-migrate")
  .description("Analyze COBOL programs and generate Java classes with tests")
  .version("0.1.0");

// Main migration command (default action)
program
  .argument("<repo>", "Path to a checked-out repository containing COBOL sources")
  .option("-o, --output <path>", "Root directory for job output")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--stack <name>", "Target stack hint passed to the generator")
  .option("--package <name>", "Java package for generated classes")
  .option("--job-id <id>", "Use this job ID instead of generating one")
  .option("--select <programs...>", "Only migrate these programs (file name or relative path)")
  .option("--branch <name>", "Branch the repository was checked out at")
  .option("--commit <hash>", "Commit the repository was checked out at")
  .option("-v, --verbose", "Verbose output")
  .action(migrateCommand);

// Analyze command - print the structural model of one file
program
  .command("analyze <file>")
  .description("Print the structural model extracted from one COBOL source file")
  .action(analyzeCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
