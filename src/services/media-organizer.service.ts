import chalk from 'chalk';
import { OPERATIONS_PREVIEW_LIMIT } from '../config/constants';
import { Movie, OperationMode, PendingOperation, Show } from '../types/media.types';
import { printOperations } from '../utils/console.util';
import { OperationExecutor } from './operation-executor.service';
import { Prompter } from './prompt.service';
import { TransactionPlanner } from './transaction-planner.service';

export interface OrganizeOptions {
  mode: OperationMode;
  source: string;
  target?: string;
  autoConfirm: boolean;
  dryRun: boolean;
}

export interface OrganizeResult {
  planned: number;
  executed: number;
  cancelled: boolean;
}

/**
 * MediaOrganizerService ties planning to execution:
 * - Builds the plan for a show or a movie
 * - Prints it (first few operations, the rest on request)
 * - Asks for confirmation unless told not to
 * - Applies it with the chosen mode
 */
export class MediaOrganizerService {
  constructor(
    private readonly planner: TransactionPlanner,
    private readonly executor: OperationExecutor,
    private readonly prompter: Prompter,
  ) {}

  async organizeShow(show: Show, options: OrganizeOptions): Promise<OrganizeResult> {
    console.log(`\n📺 Planning ${options.mode} for "${show.name}" (${show.numberOfSeasons} seasons) from ${options.source}`);
    const operations = this.planner.planShow(options.source, options.target, show);
    return this.run(operations, options);
  }

  async organizeMovie(movie: Movie, options: OrganizeOptions & { requireSingleVideo: boolean }): Promise<OrganizeResult> {
    console.log(`\n🎬 Planning ${options.mode} for "${movie.title}" from ${options.source}`);
    const operations = this.planner.planMovie(options.source, options.target, movie, {
      requireSingleVideo: options.requireSingleVideo,
    });
    return this.run(operations, options);
  }

  private async run(operations: PendingOperation[], options: OrganizeOptions): Promise<OrganizeResult> {
    const result: OrganizeResult = { planned: operations.length, executed: 0, cancelled: false };

    if (operations.length === 0) {
      console.log('No files to process.');
      return result;
    }

    await this.preview(options.mode, operations, options.autoConfirm);

    if (options.dryRun) {
      console.log(chalk.yellow(`Dry run: ${operations.length} operations not applied.`));
      return result;
    }

    const proceed = options.autoConfirm || (await this.prompter.confirm('Proceed with operations?', true));
    if (!proceed) {
      console.log('Cancelled.');
      return { ...result, cancelled: true };
    }

    result.executed = this.executor.execute(options.mode, operations);
    console.log(`✓ Done. ${result.executed} files processed.`);
    return result;
  }

  private async preview(mode: OperationMode, operations: PendingOperation[], autoConfirm: boolean): Promise<void> {
    if (operations.length <= OPERATIONS_PREVIEW_LIMIT) {
      printOperations(mode, operations);
      return;
    }

    printOperations(mode, operations.slice(0, OPERATIONS_PREVIEW_LIMIT));
    const remaining = operations.length - OPERATIONS_PREVIEW_LIMIT;
    console.log(chalk.yellow(`... and ${remaining} more operations`));

    // Unattended runs never stop to ask
    if (!autoConfirm && (await this.prompter.confirm('Show all operations?', false))) {
      console.log();
      printOperations(mode, operations.slice(OPERATIONS_PREVIEW_LIMIT));
    }
  }
}
