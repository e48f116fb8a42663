/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  PROGRAM_NAME: 'go-vanity-html',
  DIVIDER_LENGTH: 70,
} as const;

/**
 * Options that may also be written Go-style with a single dash
 */
const GO_STYLE_FLAGS = new Map<string, { flag: string; boolean: boolean; negated?: string }>([
  ['replace', { flag: '--replace', boolean: false }],
  ['r', { flag: '-r', boolean: false }],
  ['o', { flag: '-o', boolean: false }],
  ['output', { flag: '--output', boolean: false }],
  ['debug', { flag: '--debug', boolean: true, negated: '--no-debug' }],
  ['no-debug', { flag: '--no-debug', boolean: true }],
  ['help', { flag: '--help', boolean: true }],
  ['h', { flag: '--help', boolean: true }],
  ['version', { flag: '--version', boolean: true }],
]);

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Rewrites Go-style flags (`-replace x`, `-replace=x`, `--o x`, `-o=x`,
 * `-debug=false`) into the forms commander understands. Arguments after
 * `--` are left untouched.
 */
export function normalizeFlags(args: readonly string[]): string[] {
  const normalized: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      normalized.push(...args.slice(i));
      break;
    }

    const match = /^--?([A-Za-z][\w-]*)(?:=(.*))?$/s.exec(arg);
    const option = match ? GO_STYLE_FLAGS.get(match[1]) : undefined;
    if (!match || !option) {
      normalized.push(arg);
      continue;
    }

    const value = match[2];
    if (option.boolean) {
      if (value === undefined || value.toLowerCase() !== 'false') {
        normalized.push(option.flag);
      } else if (option.negated) {
        normalized.push(option.negated);
      }
      continue;
    }

    normalized.push(option.flag);
    if (value !== undefined) {
      normalized.push(value);
    }
  }

  return normalized;
}
