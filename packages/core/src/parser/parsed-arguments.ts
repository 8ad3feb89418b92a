import type { ValueType } from "../convert/value-types";
import { isBooleanType } from "../convert/value-types";
import { tryConvert } from "../convert/type-converter";

interface OptionEntry {
  name: string;
  values: string[];
}

export type TryGetResult<T> = { ok: true; value: T } | { ok: false };

/**
 * Result of tokenizing one argument vector.
 *
 * Option and bound-argument names are case-insensitive; insertion order is kept.
 */
export class ParsedArguments {
  private readonly options = new Map<string, OptionEntry>();
  private readonly positionals: string[] = [];
  private readonly named = new Map<string, string>();

  get positional(): readonly string[] {
    return this.positionals;
  }

  get optionNames(): string[] {
    return [...this.options.values()].map((entry) => entry.name);
  }

  /** Record an option; without a value it is a flag. Repeated calls accumulate values. */
  addOption(name: string, value?: string): void {
    const key = name.toLowerCase();
    let entry = this.options.get(key);
    if (!entry) {
      entry = { name, values: [] };
      this.options.set(key, entry);
    }
    if (value !== undefined) {
      entry.values.push(value);
    }
  }

  addPositional(value: string): void {
    this.positionals.push(value);
  }

  addNamedArgument(name: string, value: string): void {
    this.named.set(name.toLowerCase(), value);
  }

  hasOption(name: string): boolean {
    return this.options.has(name.toLowerCase());
  }

  getOptionValue(name: string): string | undefined {
    return this.options.get(name.toLowerCase())?.values[0];
  }

  getOptionValues(name: string): readonly string[] {
    return this.options.get(name.toLowerCase())?.values ?? [];
  }

  getPositional(index: number): string | undefined {
    return index >= 0 && index < this.positionals.length ? this.positionals[index] : undefined;
  }

  hasNamedArgument(name: string): boolean {
    return this.named.has(name.toLowerCase());
  }

  getNamedArgument(name: string): string | undefined {
    return this.named.get(name.toLowerCase());
  }

  /** Strict accessor: fails when the option has no value or the value does not parse. */
  tryGetValue<T>(name: string, type: ValueType<T>): TryGetResult<T> {
    const raw = this.getOptionValue(name);
    if (raw === undefined) {
      return { ok: false };
    }
    const converted = tryConvert(raw, type);
    return converted.ok ? { ok: true, value: converted.value } : { ok: false };
  }

  getOption<T>(name: string, type: ValueType<T>, defaultValue: T = type.zero): T {
    if (isBooleanType(type) && this.hasOption(name)) {
      // a bare flag parses as "" which reads as true
      return type.parse(this.getOptionValue(name) ?? "");
    }
    const result = this.tryGetValue(name, type);
    return result.ok ? result.value : defaultValue;
  }

  /** Every value of a repeated option, skipping values that do not parse. */
  getOptionValuesAs<T>(name: string, type: ValueType<T>): T[] {
    const values: T[] = [];
    for (const raw of this.getOptionValues(name)) {
      const converted = tryConvert(raw, type);
      if (converted.ok) {
        values.push(converted.value);
      }
    }
    return values;
  }

  getNamedArgumentAs<T>(name: string, type: ValueType<T>, defaultValue: T = type.zero): T {
    const raw = this.getNamedArgument(name);
    if (raw === undefined) {
      return defaultValue;
    }
    const converted = tryConvert(raw, type);
    return converted.ok ? converted.value : defaultValue;
  }
}
