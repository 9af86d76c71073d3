export function getConfigPath(): string {
  return process.env["DM_LEDGER_CONFIG_PATH"] ?? "dm-ledger.config.json";
}
