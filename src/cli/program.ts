import { Cli } from "clipanion";
import { createRequire } from "node:module";
import { RunCommand } from "./commands/run.js";
import { DiscoverCommand } from "./commands/discover.js";
import { ProfileCommand } from "./commands/profile.js";
import { LinkedInCommand } from "./commands/linkedin.js";
import { DoctorCommand } from "./commands/doctor.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "dm-ledger",
    binaryName: "dm-ledger",
    binaryVersion: pkg.version,
  });

  cli.register(RunCommand);

  // Lookups
  cli.register(DiscoverCommand);
  cli.register(ProfileCommand);
  cli.register(LinkedInCommand);

  // Diagnostics
  cli.register(DoctorCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
