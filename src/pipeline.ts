import { rewriteAdmonitions } from './admonitions.js';
import { rewriteExerciseSolution } from './exercises.js';
import { NOTEBOOK_FORMAT, readNotebook } from './notebook.js';
import type { ParseOptions } from './parser.js';
import type { KernelSpec, Notebook } from './types.js';

/**
 * Kernel of the browser notebook runtime
 */
export const PYODIDE_KERNEL: KernelSpec = {
  name: 'python',
  display_name: 'Python (Pyodide)',
};

/**
 * Options for processing one document
 */
export interface ProcessOptions extends ParseOptions {
  /** Kernel to declare in the notebook metadata (default: PYODIDE_KERNEL) */
  kernel?: KernelSpec;
}

/**
 * Rewrite the text-level markup of a document: exercise and solution markers
 * first, then admonitions (located on the already rewritten text).
 */
export function rewriteMarkup(rawText: string, options: ParseOptions = {}): string {
  return rewriteAdmonitions(rewriteExerciseSolution(rawText), options);
}

/**
 * Turn one source document into a notebook for the browser runtime.
 * Nothing is written; errors from any stage propagate to the caller.
 */
export function processDocument(rawText: string, options: ProcessOptions = {}): Notebook {
  const { kernel = PYODIDE_KERNEL, ...parseOptions } = options;

  const notebook = readNotebook(rewriteMarkup(rawText, parseOptions), NOTEBOOK_FORMAT);
  notebook.metadata.kernelspec = { name: kernel.name, display_name: kernel.display_name };

  return notebook;
}
