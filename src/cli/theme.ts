export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  info: (s: string) => `\x1b[34m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

/** Theme that leaves text unchanged, for non-TTY output. */
export const plainTheme: Record<keyof typeof theme, (s: string) => string> = {
  error: (s) => s,
  success: (s) => s,
  warn: (s) => s,
  info: (s) => s,
  muted: (s) => s,
};
