import { Command, Option } from "clipanion";
import * as t from "typanion";
import type { RunOptions, RunReport } from "../../pipeline/types.js";
import { DEFAULT_MAX_MESSAGES } from "../../pipeline/orchestrator.js";
import { createOrchestrator, createRuntime, type Runtime } from "../runtime.js";
import { errorMessage } from "../../utils/errors.js";

const isPositiveInt = t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)]);
const isNonNegativeInt = t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(0)]);

export function formatReport(report: RunReport): string {
  const lines = [
    `Processed: ${report.processed}`,
    `Skipped:   ${report.skipped}`,
    `Failed:    ${report.failed}`,
    `Written:   ${report.written}`,
    `Messages:  ${report.stats.totalMessages} (avg ${report.stats.averageMessages} per conversation)`,
    `Summaries: ${report.stats.aiSummaries} ai, ${report.stats.fallbackSummaries} fallback`,
    `LinkedIn:  ${report.stats.linkedinFound} found`,
  ];
  if (report.stats.mostRecentMessageAt) {
    lines.push(`Latest:    ${report.stats.mostRecentMessageAt}`);
  }
  for (const failure of report.failures) {
    lines.push(`  failed ${failure.counterpartId}: ${failure.error}`);
  }
  if (report.writeError) {
    lines.push(`Sheet not written: ${report.writeError}`);
  }
  return lines.join("\n") + "\n";
}

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Fetch DM conversations, summarize them and upsert one row per counterpart",
    details: `
      Counterparts are either given as ids or picked from the most recent DM activity with \`--recent\`.
      With \`--dry-run\` nothing is written to the sheet and the rows are printed as JSON.
    `,
    examples: [
      ["Process the 10 most recent conversations", "dm-ledger run --recent 10"],
      ["Process two counterparts, last 30 days only", "dm-ledger run 12345 67890 --since-days 30"],
      ["Preview rows without writing", "dm-ledger run --recent 5 --dry-run"],
    ],
  });

  ids = Option.Rest({ name: "ids" });

  recent = Option.String("--recent", {
    description: "Process the N most recently active counterparts",
    validator: isPositiveInt,
  });

  maxMessages = Option.String("--max-messages", String(DEFAULT_MAX_MESSAGES), {
    description: "Messages to fetch per conversation",
    validator: isPositiveInt,
  });

  sinceDays = Option.String("--since-days", {
    description: "Only consider messages from the last N days",
    validator: isPositiveInt,
  });

  summaries = Option.Boolean("--summaries", true, {
    description: "Summarize with the language model (--no-summaries for the offline summary)",
  });

  clearSheet = Option.Boolean("--clear-sheet", false, {
    description: "Remove existing data rows before writing",
  });

  dryRun = Option.Boolean("--dry-run", false, {
    description: "Print rows instead of writing them",
  });

  enrichLinkedin = Option.Boolean("--enrich-linkedin", false, {
    description: "Look up LinkedIn profiles with the language model when the profile states none",
  });

  enrichLimit = Option.String("--enrich-limit", "0", {
    description: "Cap on model-assisted LinkedIn lookups (0 = no cap)",
    validator: isNonNegativeInt,
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    if (this.ids.length === 0 && this.recent === undefined) {
      this.context.stderr.write("Pass counterpart ids or --recent N\n");
      process.exitCode = 1;
      return;
    }

    let runtime: Runtime;
    try {
      runtime = createRuntime(this.config);
    } catch (err) {
      this.context.stderr.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const options: RunOptions = {
      counterpartIds: this.ids.length > 0 ? this.ids : undefined,
      recent: this.recent,
      maxMessages: this.maxMessages,
      sinceDays: this.sinceDays,
      summarize: this.summaries,
      clearSheet: this.clearSheet,
      dryRun: this.dryRun,
      enrichLinkedIn: this.enrichLinkedin,
      enrichLimit: this.enrichLimit,
    };

    let report: RunReport;
    try {
      report = await createOrchestrator(runtime).run(options);
    } catch (err) {
      runtime.logger.error({ err: errorMessage(err) }, "run aborted");
      this.context.stderr.write(`Run aborted: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    if (report.processed + report.skipped + report.failed === 0) {
      this.context.stderr.write("No counterparts selected\n");
      process.exitCode = 1;
      return;
    }

    if (this.dryRun) {
      this.context.stdout.write(JSON.stringify(report.rows, null, 2) + "\n");
    }
    this.context.stderr.write(formatReport(report));
  }
}
