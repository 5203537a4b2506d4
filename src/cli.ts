import path from 'node:path';
import { loadConfig, parseConfig } from './config.js';
import { processDirectory, writeLiteManifest } from './loader.js';

export const USAGE =
  'Usage: lite-notebooks <input_dir> <output_dir> [--config=<file>] [--language=<name>] [--continue-on-error]';

/**
 * Parsed command line
 */
export interface CliArgs {
  /** Directory containing input notebooks */
  inputDir: string;
  /** Directory to which notebooks are written */
  outputDir: string;
  configPath?: string;
  language?: string;
  continueOnError: boolean;
}

/**
 * Parse command line arguments (without node and script). Returns null on a usage error.
 */
export function parseCliArgs(argv: string[]): CliArgs | null {
  const positional: string[] = [];
  const args: Partial<CliArgs> = { continueOnError: false };

  for (const arg of argv) {
    if (arg === '--continue-on-error') {
      args.continueOnError = true;
    } else if (arg.startsWith('--config=')) {
      args.configPath = arg.slice('--config='.length);
    } else if (arg.startsWith('--language=')) {
      args.language = arg.slice('--language='.length);
    } else if (arg.startsWith('--')) {
      return null;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    return null;
  }
  return {
    inputDir: positional[0],
    outputDir: positional[1],
    configPath: args.configPath,
    language: args.language,
    continueOnError: args.continueOnError ?? false,
  };
}

/**
 * Run the converter. Resolves to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (!args) {
    console.error(USAGE);
    return 1;
  }

  const loaded = await loadConfig(args.configPath);
  // --language goes through the same validation as the config file
  const config = args.language === undefined
    ? loaded
    : parseConfig({ ...loaded, language: args.language }, '--language');
  const inputDir = path.resolve(args.inputDir);
  const outputDir = path.resolve(args.outputDir);

  console.log(`[Process] Converting ${config.inputSuffix} notebooks from ${inputDir} to ${outputDir}`);

  const result = processDirectory({
    inputDir,
    outputDir,
    inputSuffix: config.inputSuffix,
    outputSuffix: config.outputSuffix,
    kernel: { name: config.kernelName, display_name: config.kernelDisplayName },
    onError: args.continueOnError ? 'continue' : config.onError,
    haltLevel: config.haltLevel,
  });

  for (const warning of result.warnings) {
    console.warn(`[Process] ${warning}`);
  }
  for (const outPath of result.written) {
    console.log(`[Process] Wrote ${path.basename(outPath)}`);
  }
  for (const failure of result.failures) {
    console.error(`[Process] Skipped ${failure.documentId}: ${failure.error.message}`);
  }

  const manifestPath = writeLiteManifest(outputDir, config.language);
  console.log(`[Process] Wrote ${path.basename(manifestPath)} (${result.written.length} notebooks)`);

  return result.failures.length > 0 ? 1 : 0;
}
