export interface IdentityContext {
  readonly name: string;
  readonly username: string;
  readonly location?: string;
  readonly bio?: string;
  readonly company?: string;
  readonly summary?: string;
}

export const NOT_FOUND = "NOT_FOUND";

export function buildGeneratePrompt(ctx: IdentityContext, rejected: readonly string[]): string {
  const target = ctx.company ? `${ctx.name} at ${ctx.company}` : ctx.name;
  const lines = [
    `Find the LinkedIn profile URL of ${target}.`,
    "",
    `Name: ${ctx.name}`,
    `X handle: @${ctx.username}`,
    `Location: ${ctx.location ?? "Unknown"}`,
    `Company: ${ctx.company ?? "Unknown"}`,
  ];
  if (ctx.summary) {
    lines.push(`What we talked about: ${ctx.summary}`);
  }
  if (rejected.length > 0) {
    lines.push("", "These candidates were already rejected; do not answer with any of them:");
    for (const url of rejected) lines.push(`- ${url}`);
  }
  lines.push(
    "",
    "Rules:",
    "- Output ONLY the LinkedIn profile URL on a single line (format: https://www.linkedin.com/in/...).",
    "- No extra text, no explanation, no code fences.",
    `- If you cannot find a confident match, output exactly: ${NOT_FOUND}`,
  );
  return lines.join("\n");
}

export function buildValidatePrompt(ctx: IdentityContext, candidate: string): string {
  return [
    "Evaluate whether this LinkedIn URL most likely belongs to the person described.",
    `Name: ${ctx.name}`,
    `X handle: @${ctx.username}`,
    `Location: ${ctx.location ?? "Unknown"}`,
    `Context: ${ctx.bio ?? ""}`,
    `Company: ${ctx.company ?? ""}`,
    `Candidate: ${candidate}`,
    "",
    "Rules:",
    "- Output ONLY PASS or FAIL on a single line.",
    "- PASS if the profile slug strongly matches the name and the context corroborates it; otherwise FAIL.",
  ].join("\n");
}

export type Verdict = "pass" | "fail";

export function parseVerdict(answer: string): Verdict {
  const decision = answer.trim().toUpperCase();
  return decision.startsWith("PASS") || decision === "YES" || decision === "TRUE" ? "pass" : "fail";
}

export function isNotFound(answer: string): boolean {
  return answer.trim().toUpperCase().startsWith(NOT_FOUND);
}
