/**
 * Flag parsing for the lexicon commands.
 * Accepts --name=value, and bare --name which reads as "true". Positional
 * arguments are ignored.
 */

export type Flags = Readonly<Record<string, string>>;

export function parseFlags(args: readonly string[]): Flags {
  const flags: Record<string, string> = {};
  for (const arg of args) {
    if (!arg.startsWith("--")) continue;
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq < 0) {
      flags[body] = "true";
    } else if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
    }
  }
  return flags;
}

/** Value of a flag; an empty value counts as absent. */
export function flagValue(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  return value === undefined || value === "" ? undefined : value;
}

export function requireFlag(flags: Flags, name: string, what: string): string {
  const value = flagValue(flags, name);
  if (value === undefined) {
    throw new Error(`Missing required argument: --${name} (${what})`);
  }
  return value;
}

/** Integer flag; absent stays undefined, anything else non-numeric is NaN so validation reports it. */
export function intFlag(flags: Flags, name: string): number | undefined {
  const value = flagValue(flags, name);
  if (value === undefined) return undefined;
  return /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

/** On/off switch; undefined when the flag is not given. */
export function switchFlag(flags: Flags, name: string): boolean | undefined {
  const value = flagValue(flags, name);
  if (value === undefined) return undefined;
  return value === "true" || value === "1";
}
