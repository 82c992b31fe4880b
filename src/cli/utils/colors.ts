/**
 * Terminal color helpers shared by the CLI commands
 */

export interface Colors {
  reset: string;
  bold: string;
  dim: string;
  green: string;
  red: string;
  yellow: string;
  cyan: string;
}

export interface Formatters {
  c: Colors;
  ok: (text: string) => string;
  fail: (text: string) => string;
  warn: (text: string) => string;
  header: (text: string) => string;
  dimText: (text: string) => string;
}

/**
 * Color codes plus line formatters. Codes are empty strings when the stream
 * is not a terminal.
 */
export function createFormatters(useColor?: boolean): Formatters {
  const colored = useColor ?? process.stdout.isTTY === true;
  const code = (value: string): string => (colored ? value : "");

  const c: Colors = {
    reset: code("\x1b[0m"),
    bold: code("\x1b[1m"),
    dim: code("\x1b[2m"),
    green: code("\x1b[32m"),
    red: code("\x1b[31m"),
    yellow: code("\x1b[33m"),
    cyan: code("\x1b[36m"),
  };

  return {
    c,
    ok: (text) => `${c.green}✓${c.reset} ${text}`,
    fail: (text) => `${c.red}✗${c.reset} ${text}`,
    warn: (text) => `${c.yellow}⚠${c.reset} ${text}`,
    header: (text) => `\n${c.bold}${text}${c.reset}`,
    dimText: (text) => `${c.dim}${text}${c.reset}`,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
