#!/usr/bin/env node
import { Command } from "commander";
import { LIBRARY_VERSION } from "@svgscribe/render-svg";
import { initCommand } from "./commands/init.js";
import { renderCommand } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("svgscribe")
  .description("Write SVG documents from scene description files")
  .version(LIBRARY_VERSION);

program
  .command("render <input>")
  .description("Render a YAML/JSON scene file to SVG")
  .option("-o, --output <file>", "Output file path (default: <input> without its extension)")
  .option("--no-extension", "Do not append .svg/.html to the output path")
  .option("--seed <n>", "Seed for random colors (overrides the scene's seed)")
  .action(renderCommand);

program
  .command("validate <input>")
  .description("Report every diagnostic raised while serializing a scene")
  .action(validateCommand);

program
  .command("init")
  .description("Print a template scene file")
  .option("-t, --template <name>", "Template name (basic, chart, animated)", "basic")
  .action(initCommand);

program.parse();
