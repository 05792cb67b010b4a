/**
 * MU0 emulator entry point
 *
 * Usage: mu0 [-s|--step] [--max-steps N] [source.asm]
 */

import React from 'react';
import { readFileSync } from 'fs';
import { basename } from 'path';
import { render } from 'ink';
import { Mu0Error, programs } from '../../core/src';
import { App } from './App';
import { parseArgs, usage, UsageError, type CliOptions } from './args';
import { runBatch } from './batch';
import { config } from './config';

function readArgs(): CliOptions {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(usage());
      process.exit(1);
    }
    throw error;
  }
}

function readSource(sourcePath: string): string {
  try {
    return readFileSync(sourcePath, 'utf8');
  } catch (error) {
    console.error(`❌ Cannot read source file ${sourcePath}: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

function main(): void {
  const options = readArgs();
  if (options.help) {
    console.log(usage());
    return;
  }

  try {
    config.validate();
  } catch (error) {
    console.error('❌ Invalid configuration:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const maxSteps = options.maxSteps ?? config.maxSteps;
  const showAllMemory = config.showAllMemory;

  if (!options.sourcePath) {
    render(<App programs={programs} maxSteps={maxSteps} showAllMemory={showAllMemory} />);
    return;
  }

  const source = readSource(options.sourcePath);

  if (options.step) {
    const initialProgram = { name: basename(options.sourcePath), source };
    render(
      <App programs={programs} maxSteps={maxSteps} showAllMemory={showAllMemory} initialProgram={initialProgram} />
    );
    return;
  }

  try {
    const { outcome } = runBatch(source, { maxSteps, showAllMemory });
    process.exitCode = outcome === 'limit' ? 2 : 0;
  } catch (error) {
    if (error instanceof Mu0Error) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

main();
