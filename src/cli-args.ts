import path from "node:path";
import { ANALYSIS_CONFIG } from "./analysis/config.js";

export interface CliArgs {
  collectionDir: string;
  topK: number;
  outputPath?: string;
  help: boolean;
}

function valueOf(flag: string, next: string | undefined): string {
  if (next === undefined || !next.trim() || next.startsWith("-")) {
    throw new Error(`${flag} expects a value`);
  }
  return next;
}

export function parseArgs(
  argv: string[],
  defaultCollectionDir: string = process.env["COLLECTION_DIR"] ?? "Collection_1",
): CliArgs {
  const args: CliArgs = {
    collectionDir: defaultCollectionDir,
    topK: ANALYSIS_CONFIG.topK,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--top-k" || arg === "-k") {
      const raw = valueOf(arg, argv[i + 1]);
      const topK = Number(raw);
      if (!Number.isInteger(topK) || topK < 0) {
        throw new Error(`${arg} expects a non-negative integer, got "${raw}"`);
      }
      args.topK = topK;
      i++;
    } else if (arg === "--output" || arg === "-o") {
      args.outputPath = path.resolve(valueOf(arg, argv[i + 1]));
      i++;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg !== undefined && arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (arg !== undefined) {
      args.collectionDir = arg;
    }
  }

  args.collectionDir = path.resolve(args.collectionDir);
  return args;
}
