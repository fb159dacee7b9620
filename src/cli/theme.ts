export type StyleKind = "header" | "rule" | "error";

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  brightGreen: "\x1b[92m",
  red: "\x1b[31m",
  dim: "\x1b[2m"
};

export function shouldUseColor(
  stream: { isTTY?: boolean },
  env: Record<string, string | undefined> = process.env
): boolean {
  if (env.NO_COLOR !== undefined || env.DIFF_TIMER_THEME === "none") return false;
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== "0") return true;
  return Boolean(stream.isTTY);
}

export function styleText(text: string, kind: StyleKind, enabled: boolean): string {
  if (!enabled) return text;
  switch (kind) {
    case "header":
      return `${ANSI.bold}${ANSI.brightGreen}${text}${ANSI.reset}`;
    case "rule":
      return `${ANSI.dim}${text}${ANSI.reset}`;
    case "error":
      return `${ANSI.red}${text}${ANSI.reset}`;
    default:
      return text;
  }
}
