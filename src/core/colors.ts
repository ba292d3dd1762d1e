export const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  blue: "\x1b[34m",
} as const;

export type Color = keyof typeof colors;

// https://no-color.org
const colorEnabled = (): boolean => !process.env.NO_COLOR;

export function colorize(text: string, color: Color): string {
  return colorEnabled() ? `${colors[color]}${text}${colors.reset}` : text;
}

export function success(text: string): string {
  return colorize(`✓ ${text}`, "green");
}

export function error(text: string): string {
  return colorize(`✗ ${text}`, "red");
}

export function info(text: string): string {
  return colorize(`ℹ ${text}`, "blue");
}
