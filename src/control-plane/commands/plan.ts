import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { listCommandOptionsSchema, planCommandOptionsSchema } from '../validators.js';
import {
  print,
  formatJson,
  formatPlanDetail,
  formatPlanList,
  formatSuccess,
} from '../formatter.js';
import { PlanCategory } from '../../types/index.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the plan command.
 */
export function createPlanCommand(getServices: ServiceProvider): Command {
  return new Command('plan')
    .description('Decompose a question into a plan of dependent tasks')
    .argument('<question>', 'Business question to plan for')
    .option('--scene <scene>', 'Scene tag recorded on the plan')
    .option(
      '--category <category>',
      `Force the category (${Object.values(PlanCategory).join(', ')})`
    )
    .option('--json', 'Output result as JSON', false)
    .action(async (question: string, rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(planCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const plan = await getServices().planning.buildPlan({
          question,
          scene: options.scene,
          category: options.category,
        });

        if (options.json) {
          print(formatJson(plan));
          return;
        }
        print(formatSuccess(`Plan created: ${plan.planId}`));
        print('');
        print(formatPlanDetail(plan));
      } catch (error) {
        reportCommandError(error);
      }
    });
}

/**
 * Create the plans command.
 */
export function createPlansCommand(getServices: ServiceProvider): Command {
  return new Command('plans')
    .description('List recent plans, newest first')
    .option('-l, --limit <n>', 'Maximum number of plans to show', '20')
    .option('--json', 'Output result as JSON', false)
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(listCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const plans = await getServices().planning.listPlanHistory(options.limit);
        print(options.json ? formatJson(plans) : formatPlanList(plans));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
