import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface TerminalConfig {
  /** Step cap for run-to-completion; the machine itself has none */
  maxSteps: number;
  /** Dump every non-zero cell rather than only the cells written so far */
  showAllMemory: boolean;
  validate(): void;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TerminalConfig {
  // Digits only, as for --max-steps; anything else fails validate()
  const maxSteps = env.MU0_MAX_STEPS || '100000';

  return {
    maxSteps: /^\d+$/.test(maxSteps) ? Number(maxSteps) : NaN,
    showAllMemory: env.MU0_SHOW_ALL_MEMORY === 'true',

    // Validate config
    validate(): void {
      if (!Number.isInteger(this.maxSteps) || this.maxSteps <= 0) {
        throw new Error(
          `MU0_MAX_STEPS must be a positive integer, got ${env.MU0_MAX_STEPS}.\n` +
          'Set it in .env or the environment, or pass --max-steps.'
        );
      }
    },
  };
}

export const config = loadConfig();
