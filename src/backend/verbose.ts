/**
 * --verbose echo of host commands.
 *
 * ProcessExecutor writes each virsh, qemu-img or ssh invocation to stderr
 * as a gray `[$]` block before spawning it, quoted so it can be pasted
 * into a shell.
 */

const PROMPT = '[$] ';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** True when stderr is an interactive terminal. */
export function supportsAnsi(): boolean {
  return process.stderr.isTTY === true;
}

/**
 * POSIX-quote one argument; arguments made only of safe characters are
 * left bare.
 */
export function quoteArg(arg: string): string {
  return SHELL_SAFE.test(arg) ? arg : `'${arg.split("'").join(`'\\''`)}'`;
}

/**
 * Render argv as a blank-line fenced block. Lines after the first (from
 * arguments with embedded newlines) are indented under the prompt.
 */
export function formatCommand(argv: string[], ansi: boolean): string {
  const continuation = ' '.repeat(PROMPT.length);
  const body = argv
    .map(quoteArg)
    .join(' ')
    .split('\n')
    .map((line, index) => `${index === 0 ? PROMPT : continuation}${line}\n`)
    .join('');
  const block = `\n${body}\n`;
  return ansi ? `${GRAY}${block}${RESET}` : block;
}
