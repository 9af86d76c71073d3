import { Command, Option } from "clipanion";
import type { Profile } from "../../pipeline/types.js";
import { createRuntime, type Runtime } from "../runtime.js";
import { resolveFromPatterns } from "../../linkedin/resolver.js";
import { errorMessage } from "../../utils/errors.js";

export function formatProfile(profile: Profile): string {
  const linkedin = resolveFromPatterns(profile);
  return [
    `Username:  @${profile.username}`,
    `Name:      ${profile.displayName}`,
    `User ID:   ${profile.counterpartId}`,
    `Location:  ${profile.location ?? "-"}`,
    `Website:   ${profile.website ?? "-"}`,
    `Verified:  ${profile.verified ? "yes" : "no"}`,
    `Bio:       ${profile.bio ?? "-"}`,
    `LinkedIn:  ${linkedin?.url ?? "not stated in profile"}`,
  ].join("\n") + "\n";
}

export class ProfileCommand extends Command {
  static override paths = [["profile"]];

  static override usage = Command.Usage({
    description: "Show a counterpart's X profile and any LinkedIn URL it states",
    examples: [["Show a profile", "dm-ledger profile 12345"]],
  });

  id = Option.String({ name: "id" });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let runtime: Runtime;
    try {
      runtime = createRuntime(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      const profile = await runtime.x.getProfile(this.id);
      this.context.stdout.write(formatProfile(profile));
    } catch (err) {
      this.context.stdout.write(`Profile lookup failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
