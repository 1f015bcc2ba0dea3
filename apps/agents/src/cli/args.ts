// Accepts `--name=value` and `--name value`. The last occurrence wins.
export function readFlag(argv: readonly string[], name: string): string | undefined {
  let found: string | undefined;
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg?.startsWith(`--${name}=`)) {
      found = arg.slice(`--${name}=`.length);
    } else if (arg === `--${name}`) {
      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith("--")) {
        found = next;
        index += 1;
      }
    }
  }
  const trimmed = found?.trim();
  return trimmed ? trimmed : undefined;
}

export function requireFlag(argv: readonly string[], name: string, usage: string): string {
  const value = readFlag(argv, name);
  if (value === undefined) {
    throw new Error(`Missing --${name}.\nUsage: ${usage}`);
  }
  return value;
}
