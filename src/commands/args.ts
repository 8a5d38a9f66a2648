export type ParsedArgs = {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
  /** Unknown options, and value options given without a value. */
  invalid: string[];
};

/**
 * Splits argv into positionals, `--flag`s and `--option value` pairs.
 * Aliases map short spellings (`-v`) onto their long form.
 */
export function parseArgs(
  args: readonly string[],
  options: { valueOptions?: readonly string[]; flags?: readonly string[]; aliases?: Readonly<Record<string, string>> }
): ParsedArgs {
  const valueOptions = new Set(options.valueOptions ?? []);
  const knownFlags = new Set(options.flags ?? []);
  const aliases = options.aliases ?? {};

  const parsed: ParsedArgs = { positionals: [], values: new Map(), flags: new Set(), invalid: [] };

  for (let i = 0; i < args.length; i += 1) {
    const raw = args[i] ?? "";
    if (!raw.startsWith("-") || raw === "-") {
      parsed.positionals.push(raw);
      continue;
    }

    const name = aliases[raw] ?? raw;
    if (valueOptions.has(name)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("-")) {
        parsed.invalid.push(raw);
        continue;
      }
      parsed.values.set(name, value.trim());
      i += 1;
      continue;
    }

    if (knownFlags.has(name)) {
      parsed.flags.add(name);
      continue;
    }

    parsed.invalid.push(raw);
  }

  return parsed;
}
