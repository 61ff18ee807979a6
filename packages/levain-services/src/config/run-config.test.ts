import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { InvalidConfigurationError } from '@levain/core';
import { parseRunConfig, loadRunConfig } from './run-config.js';

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.field;
    throw error;
  }
  return undefined;
}

describe('RunConfig', () => {
  describe('parseRunConfig', () => {
    it('should fill every default from an empty document', () => {
      expect(parseRunConfig({})).toEqual({
        preset: 'classic',
        initialState: {},
        policy: {},
        parameters: {},
        integrator: 'rk4',
        clock: { stepSizeHours: 0.1, timeScale: 1 },
        ambient: { kind: 'constant', temperature: 24 },
        durationHours: 24,
      });
    });

    it('should keep overrides and a null interval', () => {
      const config = parseRunConfig({
        preset: 'stiff',
        initialState: { temperature: 20 },
        policy: { intervalHours: null, nutrientAmount: 10 },
        parameters: { yeast: { growthRate: 0.4 } },
        seed: 7,
      });

      expect(config.preset).toBe('stiff');
      expect(config.initialState).toEqual({ temperature: 20 });
      expect(config.policy).toEqual({ intervalHours: null, nutrientAmount: 10 });
      expect(config.parameters.yeast).toEqual({ growthRate: 0.4 });
      expect(config.seed).toBe(7);
    });

    it('should reject a non-positive step size', () => {
      expect(fieldOf(() => parseRunConfig({ clock: { stepSizeHours: 0 } }))).toBe(
        'config.clock.stepSizeHours'
      );
    });

    it('should reject an unknown preset', () => {
      expect(fieldOf(() => parseRunConfig({ preset: 'rye' }))).toBe('config.preset');
    });

    it('should reject out-of-range initial values', () => {
      expect(fieldOf(() => parseRunConfig({ initialState: { hydration: 3 } }))).toBe(
        'config.initialState.hydration'
      );
    });

    it('should reject a negative feeding interval', () => {
      expect(fieldOf(() => parseRunConfig({ policy: { intervalHours: -1 } }))).toBe(
        'config.policy.intervalHours'
      );
    });

    it('should reject unknown top-level keys', () => {
      expect(fieldOf(() => parseRunConfig({ speed: 2 }))).toBe('config');
    });

    it('should reject a fractional seed', () => {
      expect(fieldOf(() => parseRunConfig({ seed: 1.5 }))).toBe('config.seed');
    });
  });

  describe('loadRunConfig', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'levain-config-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should read and validate a file', async () => {
      const path = join(directory, 'run.json');
      await writeFile(path, JSON.stringify({ preset: 'liquid', durationHours: 6 }), 'utf8');

      const config = await loadRunConfig(path);

      expect(config.preset).toBe('liquid');
      expect(config.durationHours).toBe(6);
    });

    it('should reject a file that is not JSON', async () => {
      const path = join(directory, 'broken.json');
      await writeFile(path, '{ preset: classic', 'utf8');

      await expect(loadRunConfig(path)).rejects.toThrow(`${path} is not valid JSON`);
    });

    it('should reject a missing file', async () => {
      await expect(loadRunConfig(join(directory, 'missing.json'))).rejects.toBeInstanceOf(
        InvalidConfigurationError
      );
    });
  });
});

describe('bundled configurations', () => {
  const configDir = fileURLToPath(new URL('../../../../configs/', import.meta.url));

  it('should accept the classic starter example', async () => {
    const config = await loadRunConfig(join(configDir, 'classic-starter.json'));

    expect(config.preset).toBe('classic');
    expect(config.clock.maxSubstepHours).toBe(0.05);
    expect(config.durationHours).toBe(72);
  });

  it('should accept the neglected starter example', async () => {
    const config = await loadRunConfig(join(configDir, 'neglected-starter.json'));

    expect(config.policy.intervalHours).toBeNull();
  });
});
