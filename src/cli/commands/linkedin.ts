import { Command, Option } from "clipanion";
import type { LinkedInResult, Profile } from "../../pipeline/types.js";
import { createRuntime, type Runtime } from "../runtime.js";
import { searchUrl } from "../../linkedin/patterns.js";
import { errorMessage } from "../../utils/errors.js";

export function formatLinkedIn(profile: Profile, result: LinkedInResult): string {
  const lines = [
    `@${profile.username} (${profile.displayName})`,
    `URL:        ${result.url ?? "-"}`,
    `Confidence: ${result.confidence}`,
    `Method:     ${result.method}`,
    `Attempts:   ${result.attempts}`,
  ];
  if (result.reasoning) lines.push(`Reasoning:  ${result.reasoning}`);
  lines.push(`Search:     ${searchUrl(profile.displayName || profile.username, profile.location)}`);
  return lines.join("\n") + "\n";
}

export class LinkedInCommand extends Command {
  static override paths = [["linkedin"]];

  static override usage = Command.Usage({
    description: "Resolve a counterpart's LinkedIn profile, model-assisted lookup included",
    examples: [["Resolve one counterpart", "dm-ledger linkedin 12345"]],
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
      const result = await runtime.resolver.resolve(profile);
      this.context.stdout.write(formatLinkedIn(profile, result));
    } catch (err) {
      this.context.stdout.write(`LinkedIn lookup failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
