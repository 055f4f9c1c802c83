// src/cli/commands/doctor.ts
import { Command } from 'commander';
import { BrowserSelector } from '../../core/render/browser-selector.js';
import { BROWSER_CONFIGS } from '../../core/config/browser-config.js';

export function registerDoctorCommand(
  program: Command,
  selector: BrowserSelector = new BrowserSelector()
): void {
  program
    .command('doctor')
    .description('Check which browsers can be driven')
    .action(async () => {
      let found = 0;
      for (const type of selector.getAutoPriority()) {
        const version = await selector.getVersion(type);
        const name = BROWSER_CONFIGS[type].name;
        if (version === null) {
          console.log(`✗ ${name}`);
          continue;
        }
        found++;
        console.log(`✓ ${name} ${version}`);
      }

      if (found === 0) {
        console.error('No supported browser found. Install Google Chrome or run `docsnap install-browsers`.');
        process.exitCode = 1;
      }
    });
}
