#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./init.js";
import { runCommand } from "./run.js";
import { listCommand } from "./list.js";

const program = new Command();

program
  .name("behaves")
  .description(
    "Run convention-named behavior specifications and report every condition"
  )
  .version("0.1.0");

program
  .command("init")
  .description("Create a config file and an example specification")
  .action(initCommand);

program
  .command("run")
  .description("Execute every specification and summarize the results")
  .option("-f, --filter <pattern>", "Only run specifications matching pattern")
  .option("--report", "Write a markdown failure report to the report directory")
  .action(runCommand);

program
  .command("list")
  .description("Show how each specification's methods are classified")
  .option("-f, --filter <pattern>", "Only list specifications matching pattern")
  .action(listCommand);

program.parse();
