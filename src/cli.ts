#!/usr/bin/env node
import { Command } from "commander";
import { introspectCmd } from "./commands/introspect.js";
import { describeCmd } from "./commands/describe.js";
import { generateCmd } from "./commands/generate.js";

const program = new Command();

program
  .name("rowforge")
  .description("Rowforge - seeded relational test data from table models")
  .version("0.1.0");

program.addCommand(introspectCmd());
program.addCommand(describeCmd());
program.addCommand(generateCmd());

await program.parseAsync(process.argv);
