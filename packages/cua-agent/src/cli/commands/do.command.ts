import chalk from 'chalk';
import { describeError } from '@cua/shared';
import { Step, TaskResult } from '../../agent/agent.types';
import { SafetyLevel } from '../../safety';
import { createAgent } from '../../cua.agent';
import { createTerminalTakeoverHandler } from '../takeover.prompt';

export interface DoCommandOptions {
  verbose?: boolean;
  model?: string;
  timeout?: number;
  maxActions?: number;
  safety?: SafetyLevel;
  headless?: boolean;
}

export function formatStep(step: Step): string {
  const mark = step.success ? chalk.green('✓') : chalk.red('✗');
  const target = step.target ? ` ${chalk.gray(step.target)}` : '';
  return `${mark} Step ${step.number}: ${step.action}${target}`;
}

function printResult(result: TaskResult): void {
  const seconds = (result.durationMs / 1000).toFixed(1);
  console.log();
  if (result.success) {
    console.log(chalk.green(`✅ ${result.summary}`));
  } else {
    console.log(chalk.red(`❌ ${result.summary}`));
    if (result.error) {
      console.error(chalk.red('Error:'), result.error.message);
    }
    if (result.needsHelp) {
      console.log(chalk.yellow('The agent needs help to finish this task.'));
    }
  }
  console.log(chalk.gray(`${result.steps.length} steps in ${seconds}s`));
}

export async function doCommand(
  task: string,
  options: DoCommandOptions,
): Promise<number> {
  const headless = options.headless ?? false;
  const agent = createAgent({
    model: options.model,
    timeoutMs: options.timeout,
    maxActions: options.maxActions,
    safetyLevel: options.safety,
    verbose: options.verbose,
    headless,
    onTakeover: headless ? undefined : createTerminalTakeoverHandler(),
  });

  const onSignal = () => agent.stop();
  process.once('SIGINT', onSignal);

  console.log(chalk.cyan(`\n🚀 ${task}\n`));
  try {
    const result = await agent.doWithProgress(task, (step) =>
      console.log(formatStep(step)),
    );
    printResult(result);
    return result.success ? 0 : 1;
  } catch (error) {
    console.error(chalk.red('Error:'), describeError(error));
    return 1;
  } finally {
    process.removeListener('SIGINT', onSignal);
  }
}
