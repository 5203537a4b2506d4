import fs from 'fs-extra';
import path from 'node:path';
import type { ErrorPolicy } from './config.js';
import { writeNotebook } from './notebook.js';
import { PYODIDE_KERNEL, processDocument } from './pipeline.js';
import type { KernelSpec, Severity } from './types.js';

export const MANIFEST_FILE = 'jupyter-lite.json';

/**
 * Options for converting a directory of notebooks
 */
export interface ProcessDirectoryOptions {
  /** Directory to scan for source notebooks (non-recursive) */
  inputDir: string;
  /** Directory to write notebooks to (created if missing) */
  outputDir: string;
  /** Suffix of source files (default: .Rmd) */
  inputSuffix?: string;
  /** Suffix of written files (default: .ipynb) */
  outputSuffix?: string;
  /** Kernel to declare in each notebook (default: PYODIDE_KERNEL) */
  kernel?: KernelSpec;
  /** Stop at the first failing document, or record it and go on (default: abort) */
  onError?: ErrorPolicy;
  /** Parser diagnostics at or above this level fail a document (default: severe) */
  haltLevel?: Severity;
}

/**
 * A document that could not be converted
 */
export interface DocumentFailure {
  documentId: string;
  error: Error;
}

/**
 * Result of converting a directory
 */
export interface ProcessDirectoryResult {
  /** Paths of the notebooks written, in input order */
  written: string[];
  /** Documents skipped under the 'continue' policy */
  failures: DocumentFailure[];
  /** Parser warnings, prefixed with the document they came from */
  warnings: string[];
}

/**
 * Find all files with the given suffix in a directory (non-recursive), sorted by name
 */
function findSourceFiles(dir: string, suffix: string): string[] {
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.endsWith(suffix))
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Convert every source notebook in a directory and write the results
 */
export function processDirectory(options: ProcessDirectoryOptions): ProcessDirectoryResult {
  const {
    inputDir,
    outputDir,
    inputSuffix = '.Rmd',
    outputSuffix = '.ipynb',
    kernel = PYODIDE_KERNEL,
    onError = 'abort',
    haltLevel,
  } = options;

  const written: string[] = [];
  const failures: DocumentFailure[] = [];
  const warnings: string[] = [];

  const files = findSourceFiles(inputDir, inputSuffix);
  fs.ensureDirSync(outputDir);

  for (const filePath of files) {
    const documentId = path.basename(filePath);

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const notebook = processDocument(content, {
        kernel,
        haltLevel,
        onDiagnostic: d => warnings.push(`${documentId}: line ${d.line}: ${d.message}`),
      });

      const outPath = path.join(outputDir, documentId.slice(0, -inputSuffix.length) + outputSuffix);
      fs.outputFileSync(outPath, writeNotebook(notebook));
      written.push(outPath);
    } catch (err) {
      if (onError === 'abort') {
        throw err;
      }
      failures.push({ documentId, error: err instanceof Error ? err : new Error(String(err)) });
    }
  }

  return { written, failures, warnings };
}

/**
 * The runtime's manifest: schema version and the storage key for notebook contents
 */
export function liteManifest(language = 'python') {
  return {
    'jupyter-lite-schema-version': 0,
    'jupyter-config-data': {
      contentsStorageName: `rss-${language}`,
    },
  };
}

/**
 * Write the runtime manifest into the output directory and return its path
 */
export function writeLiteManifest(outputDir: string, language = 'python'): string {
  const manifestPath = path.join(outputDir, MANIFEST_FILE);
  fs.outputJsonSync(manifestPath, liteManifest(language), { spaces: 2 });
  return manifestPath;
}
