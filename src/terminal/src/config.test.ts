import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config.maxSteps).toBe(100000);
    expect(config.showAllMemory).toBe(false);
    expect(() => config.validate()).not.toThrow();
  });

  it('should read the environment', () => {
    const config = loadConfig({ MU0_MAX_STEPS: '250', MU0_SHOW_ALL_MEMORY: 'true' });

    expect(config.maxSteps).toBe(250);
    expect(config.showAllMemory).toBe(true);
  });

  it.each(['0', '-5', 'lots', '12abc', '1.5'])('should reject MU0_MAX_STEPS=%s', (value) => {
    const config = loadConfig({ MU0_MAX_STEPS: value });

    expect(() => config.validate()).toThrow('MU0_MAX_STEPS must be a positive integer');
  });
});
