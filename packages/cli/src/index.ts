#!/usr/bin/env node
import { Builtins, Cli } from "clipanion";
import { BuildCommand } from "./commands/build.js";

const cli = new Cli({
  binaryName: "obdist",
  binaryVersion: "0.1.0",
});

cli.register(BuildCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2));
