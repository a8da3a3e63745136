#!/usr/bin/env node
/**
 * Application entry point.
 *
 * Wires configuration, the passphrase prompt, the catalog session
 * (key → encrypted store → integrity check → repository) and the interactive
 * menu. The session is closed on every way out of the menu, including
 * Ctrl+C and SIGTERM.
 */
import { existsSync } from 'fs';
import * as clack from '@clack/prompts';
import chalk from 'chalk';
import { Command } from 'commander';
import { ensureConfigDirs, getConfig } from './config';
import { IntegrityError, OpenFailedError, errorMessage, isFatalError } from './errors';
import { configureDebugLog } from './logger';
import { Menu } from './menu';
import { withSession } from './session';
import { displayError, displayInfo } from './uiUtils';
import { VaultCipher } from './vaultCipher';

interface CliOptions {
  db?: string;
}

async function promptPassphrase(creating: boolean): Promise<string | null> {
  const passphrase = await clack.password({
    message: creating ? 'Choose a passphrase for the new catalog:' : 'Enter database passphrase:',
    validate: (value) => {
      if (!value) return 'Passphrase is required';
    },
  });
  if (clack.isCancel(passphrase)) return null;
  if (!creating) return passphrase;

  // New catalogs ask twice.
  const confirmation = await clack.password({ message: 'Repeat the passphrase:' });
  if (clack.isCancel(confirmation)) return null;
  if (confirmation !== passphrase) {
    displayError('Passphrases do not match.');
    return null;
  }
  return passphrase;
}

async function main(options: CliOptions): Promise<number> {
  const config = getConfig({ databasePath: options.db });
  if (config.debug) {
    await ensureConfigDirs(config);
    configureDebugLog(config.debugLogPath);
  }

  clack.intro(chalk.bold.cyan('Book Manager - Encrypted Local Storage'));

  const creating = !existsSync(config.databasePath);
  if (creating) {
    displayInfo(`No catalog at ${config.databasePath}; a new one will be created.`);
  }

  const passphrase = await promptPassphrase(creating);
  if (passphrase === null) {
    clack.outro('Operation cancelled.');
    return 0;
  }

  const spinner = clack.spinner();
  spinner.start(creating ? 'Creating catalog...' : 'Unlocking catalog...');

  let unlocked = false;
  try {
    await withSession(
      {
        path: config.databasePath,
        passphrase,
        cipher: new VaultCipher({ s2kIterationCountByte: config.s2kIterationCountByte }),
      },
      async (session) => {
        unlocked = true;
        spinner.stop('Catalog unlocked and verified ✅');
        await new Menu(session.books).show();
        const report = await session.close();
        if (report.changed) {
          displayInfo(`Catalog saved (sha256 ${report.finalDigest.slice(0, 16)}…)`);
        }
      }
    );
    return 0;
  } catch (error) {
    if (!unlocked) spinner.stop('Could not open the catalog');
    if (error instanceof OpenFailedError) {
      displayError(error.message);
    } else if (error instanceof IntegrityError) {
      displayError('The catalog file is corrupted or has been tampered with:');
      error.details.forEach((detail) => console.error(chalk.red(`  • ${detail}`)));
    }
    if (isFatalError(error)) return 1;
    throw error;
  }
}

const program = new Command();

program
  .name('shelfvault')
  .description('Keep a personal book catalog in an encrypted local file')
  .version('1.0.0')
  .option('-d, --db <path>', 'Catalog file (default: $SHELFVAULT_DB or ./books.db)')
  .action(async (options: CliOptions) => {
    try {
      process.exitCode = await main(options);
    } catch (error) {
      // Anything thrown at the top level is fatal.
      displayError(`Fatal error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  displayError(`Fatal error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
