// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the Playwright Chromium build (optional fallback)')
    .action(() => {
      try {
        execSync('npx playwright-core install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Chromium installed successfully');
      } catch {
        console.error('✗ Failed to install Chromium');
        console.error('Note: This is optional. docsnap uses your system Chrome or Edge when available.');
        process.exitCode = 1;
      }
    });
}
