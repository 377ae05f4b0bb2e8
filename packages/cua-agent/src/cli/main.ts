#!/usr/bin/env node
import 'reflect-metadata';
import chalk from 'chalk';
import { Command, Option } from 'commander';
import { describeError, DesktopBackend } from '@cua/shared';
import { loadEnvFiles } from '../config/env.loader';
import { loadDesktopBackend } from '../cua.agent';
import { installWinstonLogger, setLogVerbosity } from '../logger/winston-logger';
import { doCommand, DoCommandOptions } from './commands/do.command';
import {
  clickCommand,
  elementsCommand,
  screenCommand,
  screenshotCommand,
  typeCommand,
} from './commands/desktop.commands';
import { parseDuration, parseNumber, parsePositiveInt } from './options';

const VERSION = '0.1.0';

async function withBackend(
  action: (backend: DesktopBackend) => Promise<void>,
): Promise<void> {
  try {
    await action(await loadDesktopBackend());
  } catch (error) {
    console.error(chalk.red('Error:'), describeError(error));
    process.exitCode = 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('cua')
    .description(chalk.cyan('Drive the desktop with a vision model'))
    .version(VERSION);

  program
    .command('do <task>')
    .description('Run a natural-language task')
    .option('-v, --verbose', 'Show debug logs')
    .addOption(
      new Option('--model <model>', 'Gemini model').choices(['flash', 'pro']),
    )
    .option('--timeout <duration>', 'Task timeout, e.g. 90s or 2m', parseDuration)
    .option('--max-actions <n>', 'Maximum number of actions', parsePositiveInt)
    .addOption(
      new Option('--safety <level>', 'Safety level').choices([
        'minimal',
        'normal',
        'strict',
      ]),
    )
    .option('--headless', 'Never prompt for takeovers')
    .action(async (task: string, options: DoCommandOptions) => {
      if (options.verbose) {
        setLogVerbosity(true);
      }
      process.exitCode = await doCommand(task, options);
    });

  program
    .command('click')
    .description('Click at logical screen coordinates')
    .argument('<x>', 'horizontal position', parseNumber)
    .argument('<y>', 'vertical position', parseNumber)
    .action((x: number, y: number) =>
      withBackend((backend) => clickCommand(backend, x, y)),
    );

  program
    .command('type <text>')
    .description('Type text into the focused element')
    .action((text: string) =>
      withBackend((backend) => typeCommand(backend, text)),
    );

  program
    .command('screenshot [file]')
    .description('Save a JPEG screenshot of the primary display')
    .action((file?: string) =>
      withBackend((backend) =>
        screenshotCommand(backend, file ?? 'screenshot.jpg'),
      ),
    );

  program
    .command('elements')
    .description('List UI elements of the focused application')
    .action(() => withBackend((backend) => elementsCommand(backend)));

  program
    .command('screen')
    .description('List displays')
    .action(() => withBackend((backend) => screenCommand(backend)));

  return program;
}

async function main(): Promise<void> {
  loadEnvFiles();
  installWinstonLogger();
  setLogVerbosity(false);
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Error:'), describeError(error));
    process.exit(1);
  });
}
