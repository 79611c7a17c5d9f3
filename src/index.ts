#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import gradient from 'gradient-string';
import ora from 'ora';
import fs from 'fs/promises';
import path from 'path';
import { loadConfig, type TrackerConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { ErrorCode, isInventoryError } from './errors.js';
import { setLogLevel } from './logger.js';
import { PalletTracker } from './palletTracker.js';
import { resolveReferenceSource } from './referenceDataset.js';
import type { BatchRecord, HistoryPeriod, HistorySortKey, SortDirection } from './types.js';

type MenuAction =
  | 'scan'
  | 'finish'
  | 'start-next'
  | 'reset'
  | 'history'
  | 'delete'
  | 'reset-record'
  | 'reload-reference'
  | 'archive'
  | 'exit';

const HISTORY_ROW_LIMIT = 50;

function describeError(error: unknown): string {
  if (isInventoryError(error)) {
    return `${chalk.bold(error.code)}  ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : date.toLocaleString();
}

class PalletBuilderCli {
  private tracker: PalletTracker;
  private persistenceBlocked = false;

  constructor(private readonly config: TrackerConfig) {
    this.tracker = new PalletTracker(config);
  }

  private showBanner(): void {
    console.clear();
    const title = gradient.pastel.multiline([
      '╔═══════════════════════════════════════════════╗',
      '║                                               ║',
      '║     PALLET BUILDER                            ║',
      '║     Serial Validation & Pallet Export         ║',
      '║                                               ║',
      '╚═══════════════════════════════════════════════╝'
    ].join('\n'));

    console.log('\n' + title + '\n');
  }

  async initialize(): Promise<void> {
    this.showBanner();

    const spinner = ora({
      text: 'Loading pallet history and reference data...',
      color: 'cyan'
    }).start();

    try {
      const summary = await this.tracker.load();
      spinner.succeed(chalk.green('System initialized'));

      const statusTable = new Table({
        style: { head: ['cyan'] },
        colWidths: [25, 60]
      });
      statusTable.push(
        ['📚 Reference', chalk.cyan(`${summary.reference.validRows} serials · ${path.basename(summary.reference.source)}`)],
        ['🗂️  History', chalk.cyan(`${summary.history.records} pallets`)],
        ['👥 Customers', summary.customers > 0 ? chalk.cyan(`${summary.customers}`) : chalk.dim('none loaded')],
        ['📦 Active pallet', chalk.magenta(`#${summary.palletNumber}`)]
      );
      if (summary.history.hidden.length > 0) {
        statusTable.push(['👻 Hidden', chalk.yellow(`${summary.history.hidden.length} pallet(s) with missing files`)]);
      }
      if (summary.history.recoveredFromCorruption) {
        statusTable.push(['⚠️  History', chalk.red('file was unreadable, backup saved as .corrupted')]);
      }

      console.log(statusTable.toString());
      console.log('');
    } catch (error) {
      spinner.fail(chalk.red('Startup failed'));
      throw error;
    }
  }

  private showStatus(): void {
    const status = this.tracker.status();
    if (!status) {
      console.log(chalk.yellow('No pallet is active.\n'));
      return;
    }

    const stateColor = status.state === 'building' ? chalk.green : status.state === 'full' ? chalk.yellow : chalk.blue;
    console.log(boxen(
      `${chalk.bold.white(`Pallet #${status.palletNumber}`)}  ` +
        `${chalk.cyan(`${status.count}/${status.capacity} panels`)}  ` +
        `${stateColor(status.state.toUpperCase())}`,
      {
        padding: { top: 0, bottom: 0, left: 1, right: 1 },
        borderStyle: 'round',
        borderColor: 'cyan'
      }
    ));

    if (this.persistenceBlocked) {
      console.log(boxen(
        chalk.bold.red('Pallet history could not be saved.\n') +
          chalk.yellow('Fix the history folder and finish the pallet again before starting a new one.'),
        { padding: 1, borderStyle: 'double', borderColor: 'red' }
      ));
    }
    console.log('');
  }

  private printError(error: unknown): void {
    console.log(chalk.red(`  ✗ ${describeError(error)}`));
  }

  async scanPanels(): Promise<void> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ SCAN PANELS ━━━━━━━━'));
    console.log(chalk.dim('Scan or type serial numbers. Press Enter on an empty line to return.\n'));

    for (;;) {
      const status = this.tracker.status();
      if (status?.state === 'full') {
        console.log(chalk.yellow(`\nPallet #${status.palletNumber} is full.`));
        const { finishNow } = await inquirer.prompt<{ finishNow: boolean }>([
          { type: 'confirm', name: 'finishNow', message: 'Finish and export it now?', default: true }
        ]);
        if (finishNow) {
          await this.finishPallet();
        }
        return;
      }

      const { serial } = await inquirer.prompt<{ serial: string }>([
        {
          type: 'input',
          name: 'serial',
          message: chalk.bold(status ? `[${status.count}/${status.capacity}] Serial:` : 'Serial:'),
          prefix: '🔎'
        }
      ]);
      if (!serial.trim()) {
        return;
      }

      try {
        const result = this.tracker.addUnit(serial);
        const extra = result.reference ? chalk.dim(` (row ${result.reference.row})`) : '';
        console.log(chalk.green(`  ✓ ${result.serial} added ${result.count}/${result.capacity}`) + extra);
        if (result.warnings.includes('unknown-unit')) {
          console.log(chalk.yellow('    ⚠ not in the reference dataset'));
        }
      } catch (error) {
        if (!isInventoryError(error)) {
          throw error;
        }
        this.printError(error);
      }
    }
  }

  async finishPallet(): Promise<void> {
    const status = this.tracker.status();
    if (!status || status.state === 'exported' || status.count === 0) {
      console.log(chalk.yellow('\nThere is no pallet with panels to finish.\n'));
      return;
    }

    const customerChoices = this.tracker.customers().map(customer => ({
      name: `${customer.name} ${chalk.dim(`| ${customer.business}`)}`,
      value: `${customer.name} | ${customer.business}`
    }));

    const { category, destination } = await inquirer.prompt<{ category: string; destination: string }>([
      {
        type: 'list',
        name: 'category',
        message: chalk.bold('Panel type:'),
        choices: this.config.panelTypes,
        prefix: '📋'
      },
      {
        type: 'list',
        name: 'destination',
        message: chalk.bold('Destination:'),
        choices: [{ name: chalk.dim('No destination'), value: '' }, ...customerChoices],
        prefix: '🚚'
      }
    ]);

    const spinner = ora(chalk.cyan(`Exporting pallet #${status.palletNumber}...`)).start();
    try {
      const record = await this.tracker.finalize({ category, destination });
      this.persistenceBlocked = false;
      spinner.succeed(chalk.green(`Pallet #${record.palletNumber} exported`));
      console.log(boxen(
        `${chalk.bold('Panels:')} ${record.serials.length}\n` +
          `${chalk.bold('File:')}   ${record.exportedFile ?? '-'}`,
        { padding: 1, borderStyle: 'round', borderColor: 'green' }
      ));
      console.log('');

      const { startNext } = await inquirer.prompt<{ startNext: boolean }>([
        { type: 'confirm', name: 'startNext', message: 'Start the next pallet?', default: true }
      ]);
      if (startNext) {
        this.startNextPallet();
      }
    } catch (error) {
      spinner.fail(chalk.red('Export failed'));
      if (!isInventoryError(error)) {
        throw error;
      }
      if (error.code === ErrorCode.PERSISTENCE_FAILURE) {
        this.persistenceBlocked = true;
      }
      this.printError(error);
      console.log(chalk.dim('The pallet was kept as it was. Fix the problem and finish it again.\n'));
    }
  }

  startNextPallet(): void {
    if (this.persistenceBlocked) {
      console.log(chalk.red('\nResolve the history save failure before starting a new pallet.\n'));
      return;
    }
    try {
      const batch = this.tracker.startNextBatch();
      console.log(chalk.green(`\n✓ Pallet #${batch.palletNumber} started\n`));
    } catch (error) {
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
  }

  async resetPallet(): Promise<void> {
    const status = this.tracker.status();
    if (!status) {
      return;
    }
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.yellow(`Remove all ${status.count} panel(s) from pallet #${status.palletNumber}?`),
        default: false
      }
    ]);
    if (!confirm) {
      return;
    }
    try {
      this.tracker.reset();
      console.log(chalk.green(`\n✓ Pallet #${status.palletNumber} cleared\n`));
    } catch (error) {
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
  }

  async viewHistory(): Promise<void> {
    const destinations = this.tracker.customers().map(customer => `${customer.name} | ${customer.business}`);
    const answers = await inquirer.prompt<{
      period: HistoryPeriod;
      destination: string;
      search: string;
      sortKey: HistorySortKey;
      direction: SortDirection;
    }>([
      {
        type: 'list',
        name: 'period',
        message: chalk.bold('Period:'),
        choices: [
          { name: 'Today', value: 'today' },
          { name: 'Last 7 days', value: 'week' },
          { name: 'This month', value: 'month' },
          { name: 'This year', value: 'year' },
          { name: 'All time', value: 'all' }
        ],
        default: 'week'
      },
      {
        type: 'list',
        name: 'destination',
        message: chalk.bold('Destination:'),
        choices: [{ name: 'Any', value: '' }, ...destinations],
        when: () => destinations.length > 0
      },
      {
        type: 'input',
        name: 'search',
        message: chalk.bold('Serial contains (optional):'),
        default: ''
      },
      {
        type: 'list',
        name: 'sortKey',
        message: chalk.bold('Sort by:'),
        choices: [
          { name: 'Completed', value: 'completedAt' },
          { name: 'Pallet number', value: 'palletNumber' },
          { name: 'File name', value: 'fileName' }
        ]
      },
      {
        type: 'list',
        name: 'direction',
        message: chalk.bold('Order:'),
        choices: [
          { name: 'Newest / highest first', value: 'desc' },
          { name: 'Oldest / lowest first', value: 'asc' }
        ]
      }
    ]);

    const records = this.tracker.query(
      {
        period: answers.period,
        destination: answers.destination || undefined,
        search: answers.search
      },
      { key: answers.sortKey, direction: answers.direction }
    );

    if (records.length === 0) {
      console.log(chalk.yellow('\nNo pallets match.\n'));
      return;
    }
    console.log(this.historyTable(records.slice(0, HISTORY_ROW_LIMIT)));
    if (records.length > HISTORY_ROW_LIMIT) {
      console.log(chalk.dim(`Showing ${HISTORY_ROW_LIMIT} of ${records.length} pallets.`));
    }
    console.log('');
  }

  private historyTable(records: BatchRecord[]): string {
    const table = new Table({
      head: ['Pallet', 'Completed', 'Type', 'Destination', 'Panels', 'File'],
      style: { head: ['cyan'], border: ['grey'] }
    });
    for (const record of records) {
      table.push([
        `#${record.palletNumber}`,
        formatTimestamp(record.completedAt),
        record.category,
        record.destination ?? chalk.dim('-'),
        record.serials.length,
        record.exportedFile ? path.basename(record.exportedFile) : chalk.dim('-')
      ]);
    }
    return table.toString();
  }

  private async askPalletNumber(message: string): Promise<number> {
    const { palletNumber } = await inquirer.prompt<{ palletNumber: string }>([
      {
        type: 'input',
        name: 'palletNumber',
        message: chalk.bold(message),
        validate: (input: string) => /^\d+$/.test(input.trim()) || 'Enter a pallet number'
      }
    ]);
    return Number.parseInt(palletNumber.trim(), 10);
  }

  async deletePallet(): Promise<void> {
    const palletNumber = await this.askPalletNumber('Pallet number to delete:');
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.red(`Delete pallet #${palletNumber} and its export file?`),
        default: false
      }
    ]);
    if (!confirm) {
      return;
    }

    const spinner = ora('Deleting pallet...').start();
    try {
      const result = await this.tracker.delete(palletNumber);
      spinner.succeed(chalk.green(`Pallet #${palletNumber} deleted, ${result.record.serials.length} serial(s) can be scanned again`));
      if (result.artifactPath && !result.artifactRemoved) {
        console.log(chalk.yellow(`  File could not be removed: ${result.artifactPath}`));
      }
    } catch (error) {
      spinner.fail(chalk.red('Delete failed'));
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
    console.log('');
  }

  async resetHistoricalPallet(): Promise<void> {
    const palletNumber = await this.askPalletNumber('Pallet number to reset:');
    const { reason } = await inquirer.prompt<{ reason: string }>([
      { type: 'input', name: 'reason', message: chalk.bold('Reason:'), default: 'Manual reset' }
    ]);

    try {
      const record = await this.tracker.resetRecord(palletNumber, reason);
      console.log(chalk.green(`\n✓ Pallet #${palletNumber} reset, ${record.serials.length} serial(s) released\n`));
    } catch (error) {
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
  }

  async reloadReference(): Promise<void> {
    const spinner = ora('Reloading reference data...').start();
    try {
      const summary = await this.tracker.reloadReference();
      await this.tracker.reloadCustomers();
      spinner.succeed(chalk.green(`${summary.validRows} serials loaded from ${path.basename(summary.source)}`));
      if (summary.skippedRows > 0) {
        console.log(chalk.yellow(`  ${summary.skippedRows} row(s) skipped`));
      }
    } catch (error) {
      spinner.fail(chalk.red('Reload failed, previous data is still in use'));
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
    console.log('');
  }

  async archiveOldPallets(): Promise<void> {
    const spinner = ora(`Archiving export folders older than ${this.config.archiveAfterDays} days...`).start();
    try {
      const result = await this.tracker.archive();
      if (result.moved.length === 0) {
        spinner.info('Nothing to archive');
      } else {
        spinner.succeed(chalk.green(`Archived ${result.moved.length} folder(s): ${result.moved.join(', ')}`));
      }
    } catch (error) {
      spinner.fail(chalk.red('Archive failed'));
      if (!isInventoryError(error)) {
        throw error;
      }
      this.printError(error);
    }
    console.log('');
  }

  async showMenu(): Promise<boolean> {
    this.showStatus();
    const status = this.tracker.status();
    const canStartNext = !status || status.state === 'exported';

    const { action } = await inquirer.prompt<{ action: MenuAction }>([
      {
        type: 'list',
        name: 'action',
        message: chalk.bold('What would you like to do?'),
        choices: [
          new inquirer.Separator(chalk.dim('— Pallet —')),
          { name: chalk.green('🔎  Scan panels'), value: 'scan', disabled: canStartNext ? 'start a pallet first' : false },
          { name: chalk.blue('✅  Finish pallet'), value: 'finish' },
          {
            name: chalk.cyan('➕  Start next pallet'),
            value: 'start-next',
            disabled: this.persistenceBlocked ? 'history not saved' : !canStartNext ? 'finish the current pallet first' : false
          },
          { name: chalk.yellow('🔄  Reset current pallet'), value: 'reset' },
          new inquirer.Separator(chalk.dim('— History —')),
          { name: chalk.blue('📊  View pallet history'), value: 'history' },
          { name: chalk.red('🗑️   Delete pallet'), value: 'delete' },
          { name: chalk.yellow('♻️   Reset completed pallet'), value: 'reset-record' },
          new inquirer.Separator(chalk.dim('— Maintenance —')),
          { name: chalk.magenta('📚  Reload reference data'), value: 'reload-reference' },
          { name: chalk.magenta('🗄️   Archive old pallets'), value: 'archive' },
          new inquirer.Separator(),
          { name: chalk.red('🚪  Exit'), value: 'exit' }
        ],
        prefix: '🎯',
        loop: false
      }
    ]);

    switch (action) {
      case 'scan':
        await this.scanPanels();
        return true;
      case 'finish':
        await this.finishPallet();
        return true;
      case 'start-next':
        this.startNextPallet();
        return true;
      case 'reset':
        await this.resetPallet();
        return true;
      case 'history':
        await this.viewHistory();
        return true;
      case 'delete':
        await this.deletePallet();
        return true;
      case 'reset-record':
        await this.resetHistoricalPallet();
        return true;
      case 'reload-reference':
        await this.reloadReference();
        return true;
      case 'archive':
        await this.archiveOldPallets();
        return true;
      case 'exit':
        console.log('');
        console.log(boxen(chalk.cyan.bold('Pallet history is saved. Goodbye!'), {
          padding: 1,
          borderStyle: 'round',
          borderColor: 'cyan'
        }));
        console.log('');
        return false;
    }
  }

  async run(): Promise<void> {
    await this.initialize();

    let continueRunning = true;
    while (continueRunning) {
      continueRunning = await this.showMenu();
    }
  }

  async runDoctor(): Promise<void> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ PALLET BUILDER DOCTOR ━━━━━━━━\n'));

    const checks: Array<{ label: string; ok: boolean; detail?: string }> = [];

    try {
      const source = await resolveReferenceSource({
        pointerFile: this.config.referencePointerFile,
        directory: this.config.referenceDir,
        pattern: this.config.referencePattern,
        search: this.config.referenceSearch
      });
      checks.push({ label: 'Reference dataset', ok: true, detail: source });
    } catch (error) {
      checks.push({ label: 'Reference dataset', ok: false, detail: describeError(error) });
    }

    try {
      await fs.mkdir(this.config.artifactRoot, { recursive: true });
      await fs.access(this.config.artifactRoot, fs.constants.W_OK);
      checks.push({ label: 'Export folder', ok: true, detail: this.config.artifactRoot });
    } catch {
      checks.push({ label: 'Export folder', ok: false, detail: this.config.artifactRoot });
    }

    try {
      await fs.access(this.config.historyFile, fs.constants.R_OK | fs.constants.W_OK);
      checks.push({ label: 'History file', ok: true, detail: this.config.historyFile });
    } catch {
      checks.push({ label: 'History file', ok: false, detail: `${this.config.historyFile} (created on first export)` });
    }

    try {
      await fs.access(this.config.customersFile);
      checks.push({ label: 'Customers', ok: true, detail: this.config.customersFile });
    } catch {
      checks.push({ label: 'Customers', ok: false, detail: `${this.config.customersFile} (optional)` });
    }

    checks.push({ label: 'Pallet capacity', ok: true, detail: String(this.config.capacity) });
    checks.push({ label: 'Unknown serials', ok: true, detail: this.config.unknownUnitPolicy });

    const table = new Table({
      style: { head: ['cyan'], border: ['grey'] },
      colWidths: [22, 10, 70]
    });
    table.push(['Check', 'Status', 'Details']);

    for (const check of checks) {
      table.push([
        check.label,
        check.ok ? chalk.green('OK') : chalk.red('FAIL'),
        check.detail || ''
      ]);
    }

    console.log(table.toString());
    console.log('');
  }
}

function printHelp(): void {
  console.log(`
Usage:
  pallet-builder [command]

Commands:
  doctor           Check reference data, export folder and history file
  -h, --help       Show this help menu

Menu Actions:
  Pallet:
    Scan panels
    Finish pallet
    Start next pallet
    Reset current pallet
  History:
    View pallet history
    Delete pallet
    Reset completed pallet
  Maintenance:
    Reload reference data
    Archive old pallets
  General:
    Exit

Configuration is read from the environment and from .env in the working
directory: PALLET_CAPACITY, UNKNOWN_UNIT_POLICY, ARTIFACT_ROOT, HISTORY_FILE,
REFERENCE_DIR, REFERENCE_POINTER_FILE, CUSTOMERS_FILE, LOG_LEVEL, ...
`.trim());
  console.log('');
}

async function main(args: string[]): Promise<void> {
  if (args.includes('-h') || args.includes('--help') || args.includes('help')) {
    printHelp();
    return;
  }
  if (args.length > 0 && !args.includes('doctor')) {
    console.log(chalk.red(`Unknown command: ${args.join(' ')}`));
    printHelp();
    process.exitCode = 1;
    return;
  }

  await loadDotEnv();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const cli = new PalletBuilderCli(config);

  if (args.includes('doctor')) {
    await cli.runDoctor();
    return;
  }
  await cli.run();
}

// Main entry point
main(process.argv.slice(2).map(arg => arg.toLowerCase())).catch(error => {
  console.error(chalk.red.bold('\n❌ Fatal error:'), describeError(error));
  process.exit(1);
});
