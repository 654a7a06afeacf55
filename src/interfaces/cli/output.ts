const NO_COLOR = 'NO_COLOR' in process.env;

function green(s: string): string  { return NO_COLOR ? s : `\x1b[32m${s}\x1b[0m`; }
function yellow(s: string): string { return NO_COLOR ? s : `\x1b[33m${s}\x1b[0m`; }
function red(s: string): string    { return NO_COLOR ? s : `\x1b[31m${s}\x1b[0m`; }

export function success(msg: string, data?: unknown): void {
  console.log(green('✓') + ' ' + msg);
  if (data !== undefined) {
    console.log(JSON.stringify(data, null, 2));
  }
}

export function warn(msg: string): void {
  console.warn(yellow('⚠') + ' ' + msg);
}

export function error(msg: string, code?: string): void {
  const prefix = code !== undefined ? red(`${code}:`) + ' ' : red('Error:') + ' ';
  process.stderr.write(prefix + msg + '\n');
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
