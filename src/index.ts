#!/usr/bin/env node
import { Builtins } from "clipanion";
import { createCli } from "./cli/program.js";

const cli = createCli();
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

await cli.runExit(process.argv.slice(2));
