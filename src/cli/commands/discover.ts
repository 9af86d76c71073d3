import { Command, Option } from "clipanion";
import * as t from "typanion";
import { createOrchestrator, createRuntime, type Runtime } from "../runtime.js";
import { errorMessage } from "../../utils/errors.js";

export class DiscoverCommand extends Command {
  static override paths = [["discover"]];

  static override usage = Command.Usage({
    description: "List the most recently active DM counterparts",
    examples: [["Show the 20 most recent counterparts", "dm-ledger discover --limit 20"]],
  });

  limit = Option.String("--limit", "10", {
    description: "Number of counterparts to list",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)]),
  });

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
      const ids = await createOrchestrator(runtime).discover(this.limit);
      if (ids.length === 0) {
        this.context.stdout.write("No recent conversations found.\n");
        return;
      }
      for (const id of ids) this.context.stdout.write(`${id}\n`);
    } catch (err) {
      this.context.stdout.write(`Discovery failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
