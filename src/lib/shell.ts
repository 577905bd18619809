import type { CommandSpec } from '../runner/executor-interface.js';

const SAFE_ARG = /^[A-Za-z0-9_\-+=.,:/@%]+$/;

export function quoteArg(arg: string): string {
  if (arg.length > 0 && SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Render a command spec as a single line for a remote POSIX shell. */
export function formatCommand(spec: Pick<CommandSpec, 'program' | 'args'>): string {
  return [spec.program, ...spec.args].map(quoteArg).join(' ');
}
