/** ANSI escape codes used by the console report */
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
} as const;

export function styled(text: string, ...styles: (keyof typeof colors)[]): string {
  const prefix = styles.map((style) => colors[style]).join('');
  return `${prefix}${text}${colors.reset}`;
}
