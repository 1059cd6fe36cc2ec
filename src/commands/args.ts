/**
 * Argument parsing shared by the commands
 */

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positional: string[];
}

const SHORT_FLAGS: Record<string, string> = {
  d: 'dispatcher',
  p: 'port',
  r: 'repo',
  w: 'work-dir',
  h: 'help',
};

export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg.startsWith('--') || (arg.startsWith('-') && arg.length === 2)) {
      const raw = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
      const key = arg.startsWith('--') ? raw : SHORT_FLAGS[raw] || raw;
      if (key !== 'help' && i + 1 < args.length && !args[i + 1].startsWith('-')) {
        flags[key] = args[i + 1];
        i += 2;
      } else {
        flags[key] = true;
        i++;
      }
    } else {
      positional.push(arg);
      i++;
    }
  }

  return { flags, positional };
}

/**
 * Environment variables set by command-line flags; `mapping` goes from flag
 * name to variable name
 */
export function flagOverrides(
  flags: Record<string, string | boolean>,
  mapping: Record<string, string>
): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [flag, variable] of Object.entries(mapping)) {
    const value = flags[flag];
    if (typeof value === 'string') {
      overrides[variable] = value;
    }
  }
  return overrides;
}
