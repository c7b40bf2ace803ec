import { InvalidInputError } from "../errors";
import { FIRST_ARCHIVED_YEAR, validateYear } from "./year";

export interface CliArgs {
  help: boolean;
  year?: string;
  outputDir?: string;
}

export function usage(now: Date = new Date()): string {
  return `Usage: oral-args-audio --year YYYY [--output-dir PATH]

Download Arizona Supreme Court oral argument audio for one year.

  --year YYYY        Target year (${FIRST_ARCHIVED_YEAR} to ${now.getFullYear()})
  --output-dir PATH  Base directory; files go to PATH/YYYY (default: ~/Downloads)`;
}

/**
 * Reads a flag given either as `--name=value` or as `--name value`.
 * @returns The value, or undefined when the flag is absent
 * @throws InvalidInputError if the flag is present with a missing or empty value
 */
export function readFlag(args: string[], name: string): string | undefined {
  const inline = args.find((a) => a.startsWith(`${name}=`));
  let value: string | undefined;

  if (inline !== undefined) {
    value = inline.slice(name.length + 1);
  } else {
    const index = args.indexOf(name);
    if (index === -1) return undefined;
    value = args[index + 1];
  }

  if (!value || value.startsWith("--")) {
    throw new InvalidInputError(`${name} requires a value`);
  }
  return value;
}

/**
 * Parses the command line. The year is validated here, before anything
 * touches the network.
 * @param args - process.argv without the node and script entries
 * @throws InvalidInputError if --year is missing or invalid
 */
export function parseCliArgs(args: string[], now: Date = new Date()): CliArgs {
  if (args.includes("--help") || args.includes("-h")) {
    return { help: true };
  }

  const yearArg = readFlag(args, "--year");
  if (yearArg === undefined) {
    throw new InvalidInputError("--year is required");
  }

  return {
    help: false,
    year: validateYear(yearArg, now),
    outputDir: readFlag(args, "--output-dir")
  };
}
