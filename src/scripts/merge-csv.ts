/**
 * Command line entry for merging a locations CSV and a blocks CSV
 */
import { createInterface } from "readline/promises";
import {
  GeoMergeService,
  geoMergeService,
} from "../services/geo-merge-service";
import {
  GeoMergeError,
  InvalidTimestampError,
} from "../services/merge-errors";
import { normalizeTimestamp } from "../services/timestamp-util";

export interface CliArgs {
  positional: string[];
  includeDecimal?: boolean;
  help: boolean;
  unknown: string[];
}

export interface CliDeps {
  service?: Pick<GeoMergeService, "merge">;
  prompt?: () => Promise<string>;
  now?: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_BAD_TIMESTAMP = 2;

// Parse command line arguments
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { positional: [], help: false, unknown: [] };

  for (const arg of argv) {
    switch (arg) {
      case "--help":
      case "-h":
        args.help = true;
        break;
      case "--decimal":
        args.includeDecimal = true;
        break;
      case "--no-decimal":
        args.includeDecimal = false;
        break;
      default:
        if (arg.startsWith("-")) {
          args.unknown.push(arg);
        } else {
          args.positional.push(arg);
        }
    }
  }

  return args;
}

// Print usage information
export function usage(): string {
  return [
    "Usage: geoip-merge <locations.csv> <blocks.csv> <output.csv> [timestamp] [options]",
    "",
    "Arguments:",
    "  timestamp           Snapshot time as DD.MM.YYYY HH:MM:SS (prompted if omitted)",
    "",
    "Options:",
    "  --decimal           Emit from/to integer columns",
    "  --no-decimal        Omit from/to integer columns",
    "  --help, -h          Show this message",
    "",
    "Example:",
    '  geoip-merge locations.csv blocks-ipv4.csv merged.csv "01.06.2024 12:00:00"',
  ].join("\n");
}

/**
 * Ask for the timestamp on the terminal; Enter means now
 */
export async function promptTimestamp(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(
      "Snapshot timestamp (DD.MM.YYYY HH:MM:SS) [Enter = now]: "
    );
    return answer.trim();
  } finally {
    rl.close();
  }
}

/**
 * Run the merge for the given arguments and return the process exit code
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    console.log(usage());
    return EXIT_OK;
  }

  if (
    args.unknown.length > 0 ||
    args.positional.length < 3 ||
    args.positional.length > 4
  ) {
    if (args.unknown.length > 0) {
      console.error(`Unknown option: ${args.unknown.join(", ")}`);
    }
    console.error(usage());
    return EXIT_FAILURE;
  }

  const [locationsFile, blocksFile, outputFile] = args.positional;
  const service = deps.service ?? geoMergeService;
  const now = deps.now ?? (() => new Date());

  const input =
    args.positional.length === 4
      ? args.positional[3]
      : await (deps.prompt ?? promptTimestamp)();

  let timestamp: string;
  try {
    timestamp = normalizeTimestamp(input, now());
  } catch (error) {
    if (!(error instanceof InvalidTimestampError)) throw error;
    console.error("✗ Invalid timestamp format");
    return EXIT_BAD_TIMESTAMP;
  }

  try {
    await service.merge({
      locationsFile,
      blocksFile,
      outputFile,
      timestamp,
      includeDecimal: args.includeDecimal,
    });
  } catch (error) {
    if (error instanceof GeoMergeError) {
      console.error(`✗ ${error.message}`);
    } else {
      console.error("Error merging GeoIP data:", error);
    }
    return EXIT_FAILURE;
  }

  console.log(`✓ Output written: ${outputFile}`);
  return EXIT_OK;
}
