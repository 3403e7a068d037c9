const RESET = "\x1b[0m";

export const COLOR = {
  gray: (s: string) => `\x1b[90m${s}${RESET}`,
  red: (s: string) => `\x1b[31m${s}${RESET}`,
  cyan: (s: string) => `\x1b[36m${s}${RESET}`,
  green: (s: string) => `\x1b[32m${s}${RESET}`,
  yellow: (s: string) => `\x1b[33m${s}${RESET}`,
  magenta: (s: string) => `\x1b[35m${s}${RESET}`,
};

export const QUIET = process.env.QUIET === "1";
export const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function preview(text: string, max = 96): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? flat.slice(0, max) + "…" : flat;
}

export function logStep(line: string): void {
  if (LOG_STEPS) console.log(line);
}

export function logWarn(line: string): void {
  if (!QUIET) console.warn(COLOR.yellow(line));
}
