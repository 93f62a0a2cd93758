#!/usr/bin/env tsx

import { Command } from "commander";
import { initCommand } from "./commands/init";
import { listCommand } from "./commands/list";
import { uploadCommand } from "./commands/upload";
import { deleteCommand } from "./commands/delete";
import { mksiteCommand } from "./commands/mksite";

const program = new Command();

program
  .name("cloudalbum")
  .description("Manage photo albums in an S3-compatible bucket and publish them as a static site")
  .version("0.1.0");

program
  .command("init")
  .description("Create a config file template")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("list")
  .description("List albums in the bucket")
  .option("--json", "Output as JSON")
  .action((options) => listCommand(options));

program
  .command("upload")
  .description("Upload the photos in a directory to an album")
  .requiredOption("-a, --album <name>", "Album name")
  .requiredOption("-p, --path <dir>", "Directory containing photos")
  .action((options) => uploadCommand(options));

program
  .command("delete")
  .description("Delete an album and all of its photos")
  .argument("<album>", "Album name")
  .option("-y, --yes", "Skip confirmation prompt")
  .action((album, options) => deleteCommand(album, options));

program
  .command("mksite")
  .description("Generate the gallery site and publish it as a static website")
  .action(() => mksiteCommand());

await program.parseAsync();
