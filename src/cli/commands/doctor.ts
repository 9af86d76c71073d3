import { Command, Option } from "clipanion";
import { createRuntime, type Runtime } from "../runtime.js";
import { getConfigPath } from "../../config/paths.js";
import { errorMessage } from "../../utils/errors.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Check configuration, credentials and sheet access",
    examples: [["Run diagnostics", "dm-ledger doctor"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    out.write("dm-ledger doctor\n");
    out.write("================\n\n");

    let allPassed = true;

    // Check 1: Config valid
    const configPath = this.config ?? getConfigPath();
    let runtime: Runtime;
    try {
      runtime = createRuntime(this.config);
      out.write(`[PASS] Config valid (${configPath})\n`);
    } catch (err) {
      out.write(`[FAIL] Config invalid (${configPath}): ${errorMessage(err)}\n`);
      out.write("\nSome checks failed.\n");
      process.exitCode = 1;
      return;
    }

    // Check 2: X credentials
    try {
      const self = await runtime.x.whoami();
      out.write(`[PASS] X credentials valid (@${self.username}, id ${self.id})\n`);
    } catch (err) {
      out.write(`[FAIL] X credentials: ${errorMessage(err)}\n`);
      allPassed = false;
    }

    // Check 3: Sheet access and header row
    if (runtime.sheet) {
      try {
        const info = await runtime.sheet.verify();
        out.write(`[PASS] Spreadsheet reachable ("${info.spreadsheetTitle}" / ${info.sheetTitle})\n`);
        const headers = await runtime.sheet.inspectHeaders();
        if (headers === "mismatch") {
          out.write("[FAIL] Header row differs from the expected columns (use run --clear-sheet to replace it)\n");
          allPassed = false;
        } else {
          out.write(`[PASS] Header row ${headers === "empty" ? "will be created on first run" : "matches"}\n`);
        }
      } catch (err) {
        out.write(`[FAIL] Spreadsheet: ${errorMessage(err)}\n`);
        allPassed = false;
      }
    } else {
      out.write("[FAIL] No spreadsheet configured (only --dry-run is possible)\n");
      allPassed = false;
    }

    // AI capabilities are optional
    const { summaryModel, linkedinModel } = runtime;
    out.write(
      `[INFO] Summaries: ${summaryModel ? `${summaryModel.provider} ${summaryModel.model}` : "offline fallback only"}\n`,
    );
    out.write(
      `[INFO] LinkedIn discovery: ${linkedinModel ? `${linkedinModel.provider} ${linkedinModel.model}` : "profile patterns only"}\n`,
    );

    out.write("\n");
    if (allPassed) {
      out.write("All checks passed.\n");
    } else {
      out.write("Some checks failed.\n");
      process.exitCode = 1;
    }
  }
}
