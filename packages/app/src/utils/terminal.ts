export const ANSI = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
  bold: '\x1b[1m'
} as const;

export type AnsiStyle = keyof typeof ANSI;

export function useColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  return process.stdout.isTTY === true;
}

/** Wrap text in a style when color is on */
export function paint(text: string, style: AnsiStyle, color: boolean): string {
  return color ? `${ANSI[style]}${text}${ANSI.reset}` : text;
}
