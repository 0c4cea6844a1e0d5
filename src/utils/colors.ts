/**
 * Terminal Colors
 *
 * ANSI color codes for log output. Disabled when NO_COLOR is set
 * or stdout is not a terminal, so redirected logs stay plain.
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m'
} as const;

export type ColorName = keyof typeof colors;

/**
 * Whether ANSI codes should be emitted for the given environment.
 */
export function shouldUseColor(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean {
  if (env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '') return false;
  if (env['FORCE_COLOR'] !== undefined && env['FORCE_COLOR'] !== '0') return true;
  return isTTY;
}

let enabled = shouldUseColor();

/**
 * Turn colors on or off (tests and piped output).
 */
export function setColorEnabled(value: boolean): void {
  enabled = value;
}

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName): string {
  if (!enabled) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  cyan: (text: string) => colorize(text, 'cyan'),
  magenta: (text: string) => colorize(text, 'magenta'),
  white: (text: string) => colorize(text, 'white'),

  // Semantic colors
  success: (text: string) => colorize(text, 'brightGreen'),
  warning: (text: string) => colorize(text, 'yellow'),
  error: (text: string) => colorize(text, 'brightRed')
} as const;
