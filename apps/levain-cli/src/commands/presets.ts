import { Command } from 'commander';
import { PRESET_NAMES, getPreset } from '@levain/core';

export const presetsCommand = new Command('presets')
  .description('List starter presets')
  .action(() => {
    console.log('\n🥖 Starter presets\n');
    for (const name of PRESET_NAMES) {
      const { description, initial } = getPreset(name);
      console.log(`   ${name.padEnd(8)} ${description}`);
      console.log(
        `            hydration ${initial.hydration}, ${initial.temperature} °C, ` +
          `yeast ${initial.yeastPopulation}, bacteria ${initial.bacteriaPopulation}, ` +
          `nutrient ${initial.nutrientLevel}`
      );
    }
    console.log('');
  });
