/**
 * Sample catalogue
 *
 * Assembles each sample up front so the menu can show what it holds,
 * or why it will not load, before anything is run.
 */

import { Mu0Error, assemble, type SampleProgram } from '../../core/src';

export type SampleSummary =
  | { name: string; loaded: true; instructions: number; dataCells: number }
  | { name: string; loaded: false; error: string };

export function summarize(program: SampleProgram): SampleSummary {
  try {
    const { program: instructions, memory } = assemble(program.source);
    return {
      name: program.name,
      loaded: true,
      instructions: instructions.length,
      dataCells: memory.touched().length,
    };
  } catch (error) {
    if (error instanceof Mu0Error) {
      // First line only; the raw source line follows on the next
      return { name: program.name, loaded: false, error: error.message.split('\n')[0] };
    }
    throw error;
  }
}

export function describeSummary(summary: SampleSummary): string {
  if (!summary.loaded) {
    return summary.error;
  }
  const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;
  return `${plural(summary.instructions, 'instruction')}, ${plural(summary.dataCells, 'INI cell')}`;
}

/**
 * Next selectable entry in the given direction, wrapping around.
 * Samples that failed to assemble are skipped; if none loaded the
 * selection stays put.
 */
export function moveSelection(summaries: readonly SampleSummary[], from: number, direction: 1 | -1): number {
  const count = summaries.length;
  for (let offset = 1; offset <= count; offset++) {
    const index = (((from + direction * offset) % count) + count) % count;
    if (summaries[index].loaded) {
      return index;
    }
  }
  return from;
}
