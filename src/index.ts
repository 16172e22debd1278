#!/usr/bin/env node
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { EnvConfig, initConfig, requireApiToken } from './config/env.config';
import { ContentSelectorService } from './services/content-selector.service';
import { MediaOrganizerService } from './services/media-organizer.service';
import { OperationExecutor } from './services/operation-executor.service';
import { InquirerPrompter } from './services/prompt.service';
import { SearchService } from './services/search.service';
import { TMDbService } from './services/tmdb.service';
import { TransactionPlanner } from './services/transaction-planner.service';
import { OrganizeTask } from './tasks/organize.task';
import { SearchTask } from './tasks/search.task';
import { OperationMode } from './types/media.types';
import { ITask } from './types/task.types';

interface OrganizeCommandOptions {
  tvId?: number;
  movieId?: number;
  yes: boolean;
  dryRun: boolean;
  allowMultipleVideos: boolean;
}

interface SearchCommandOptions {
  language?: string;
  minPopularity?: number;
}

function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError('Expected a positive integer TMDb id.');
  }
  return id;
}

function parsePopularity(value: string): number {
  const popularity = Number(value);
  if (!Number.isFinite(popularity)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return popularity;
}

function createTmdb(config: EnvConfig): TMDbService {
  return new TMDbService({ ...config, tmdbApiToken: requireApiToken(config) });
}

/**
 * Builds and runs a task; any failure, including bad configuration, ends in a non-zero exit code.
 */
async function runTask(build: () => ITask): Promise<void> {
  try {
    await build().execute();
  } catch (error) {
    console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  }
}

function organizeCommand(mode: OperationMode, description: string): Command {
  return new Command(mode)
    .description(description)
    .argument('<source>', 'Directory (or single file) to organize')
    .argument('[target]', 'Library root; defaults to the parent of <source>')
    .option('--tv-id <id>', 'TMDb TV show id', parseId)
    .option('--movie-id <id>', 'TMDb movie id', parseId)
    .option('-y, --yes', 'Skip confirmation prompt', false)
    .option('--dry-run', 'Print the plan without touching any file', false)
    .option('--allow-multiple-videos', 'Do not require exactly one video file for a movie', false)
    .action(async (source: string, target: string | undefined, opts: OrganizeCommandOptions) => {
      await runTask(() => {
        const config = initConfig();
        const tmdb = createTmdb(config);
        const prompter = new InquirerPrompter();
        const organizer = new MediaOrganizerService(new TransactionPlanner(), new OperationExecutor(), prompter);

        return new OrganizeTask(tmdb, new ContentSelectorService(tmdb, prompter), organizer, {
          mode,
          source,
          target,
          tvId: opts.tvId,
          movieId: opts.movieId,
          autoConfirm: opts.yes,
          dryRun: opts.dryRun,
          requireSingleVideo: config.requireSingleMovieFile && !opts.allowMultipleVideos,
        });
      });
    });
}

function searchCommand(): Command {
  return new Command('search')
    .description('Search TMDb for TV shows and movies')
    .argument('<query>', 'The search query')
    .option('--language <code>', 'Filter by original language (e.g. en, es, fr)')
    .option('--min-popularity <value>', 'Minimum popularity (default from MIN_POPULARITY, 1.0)', parsePopularity)
    .action(async (query: string, opts: SearchCommandOptions) => {
      await runTask(() => {
        const config = initConfig();
        return new SearchTask(new SearchService(createTmdb(config)), {
          query,
          language: opts.language,
          minPopularity: opts.minPopularity ?? config.minPopularity,
        });
      });
    });
}

const program = new Command();

program
  .name('tidyreel')
  .description('Rename and file movies and TV episodes into a library layout using TMDb metadata')
  .version('1.0.0');

program.addCommand(searchCommand());
program.addCommand(organizeCommand(OperationMode.Move, 'Move files to the target directory'));
program.addCommand(organizeCommand(OperationMode.Copy, 'Copy files to the target directory'));
program.addCommand(organizeCommand(OperationMode.Link, 'Create hard links in the target directory'));

program.parseAsync(process.argv).catch((error) => {
  console.error('Failed to run command:', error);
  process.exit(1);
});
