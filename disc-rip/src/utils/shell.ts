const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote one argument for a POSIX shell
 */
export function shellQuote(arg: string): string {
  if (arg === '') return "''";
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Render an argument vector as a copy-pasteable shell command
 */
export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(' ');
}
