const noColor = process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '';

export const supportsAnsiColor = Boolean(process.stderr.isTTY) && !noColor;

export function boldText(text: string): string {
  return supportsAnsiColor ? `\x1b[1m${text}\x1b[22m` : text;
}

export function dimText(text: string): string {
  return supportsAnsiColor ? `\x1b[2m${text}\x1b[22m` : text;
}
