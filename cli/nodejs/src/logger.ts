export function createLogger(verbose: boolean, stream: NodeJS.WriteStream = process.stdout) {
  const useColor = stream.isTTY === true;
  const wrap = (code: string, text: string) => (useColor ? `\x1b[${code}m${text}\x1b[0m` : text);
  return {
    info: (...args: unknown[]) => console.log(...args),
    ok: (text: string) => wrap("32", text),
    warn: (text: string) => wrap("33", text),
    error: (text: string) => wrap("31", text),
    dim: (text: string) => wrap("2", text),
    verbose,
  };
}

export type Logger = ReturnType<typeof createLogger>;
