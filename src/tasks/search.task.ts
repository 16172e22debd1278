import chalk from 'chalk';
import { SearchService } from '../services/search.service';
import { ITask } from '../types/task.types';
import { formatSearchTable } from '../utils/console.util';

export interface SearchTaskOptions {
  query: string;
  language?: string;
  minPopularity: number;
}

export class SearchTask implements ITask {
  name = 'SearchTask';

  constructor(
    private readonly searchService: SearchService,
    private readonly options: SearchTaskOptions,
  ) {}

  async execute(): Promise<void> {
    const { query, language, minPopularity } = this.options;
    const { rows, totalTv, totalMovies } = await this.searchService.search(query, { language, minPopularity });

    if (rows.length === 0) {
      console.log(`No results found for: ${chalk.yellow(query)}`);
      return;
    }

    console.log(`\n${formatSearchTable(rows)}`);
    console.log(`\nFound ${totalTv + totalMovies} results (${totalTv} TV, ${totalMovies} movies)`);
  }
}
