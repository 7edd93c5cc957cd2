/**
 * Verbose Output Helpers
 *
 * With --verbose, every terraform/terragrunt invocation is echoed to stderr
 * before it runs, together with the directory it runs in.
 */

const PREFIX = '[run] ';

// Same width as PREFIX so the directory lines up under the command
const CONTINUATION_INDENT = ' '.repeat(PREFIX.length);

const ANSI_GRAY = '\x1b[90m';
const ANSI_RESET = '\x1b[0m';

/**
 * Whether stderr is an interactive terminal that renders colour.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format one invocation as a block fenced by blank lines, grayed when `ansi` is set.
 */
export function formatCommand(command: string, cwd: string, ansi: boolean): string {
  const plain = `\n${PREFIX}${command}\n${CONTINUATION_INDENT}in ${cwd}\n\n`;
  return ansi ? `${ANSI_GRAY}${plain}${ANSI_RESET}` : plain;
}
