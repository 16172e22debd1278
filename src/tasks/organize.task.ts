import { ContentSelectorService, SelectedContent } from '../services/content-selector.service';
import { MediaOrganizerService, OrganizeOptions } from '../services/media-organizer.service';
import { TMDbService } from '../services/tmdb.service';
import { ContentType } from '../types/media.types';
import { ITask } from '../types/task.types';
import { OrganizeError } from '../utils/errors';

export interface OrganizeTaskOptions extends OrganizeOptions {
  tvId?: number;
  movieId?: number;
  requireSingleVideo: boolean;
}

export class OrganizeTask implements ITask {
  name = 'OrganizeTask';

  constructor(
    private readonly tmdb: TMDbService,
    private readonly selector: ContentSelectorService,
    private readonly organizer: MediaOrganizerService,
    private readonly options: OrganizeTaskOptions,
  ) {}

  async execute(): Promise<void> {
    const content = await this.resolveContent();

    if (content.type === ContentType.Show) {
      await this.organizer.organizeShow(content.show, this.options);
    } else {
      await this.organizer.organizeMovie(content.movie, this.options);
    }
  }

  private async resolveContent(): Promise<SelectedContent> {
    const { tvId, movieId, source } = this.options;

    if (tvId !== undefined && movieId !== undefined) {
      throw new OrganizeError('Cannot specify both --tv-id and --movie-id');
    }
    if (tvId !== undefined) {
      return { type: ContentType.Show, show: await this.tmdb.getShow(tvId) };
    }
    if (movieId !== undefined) {
      return { type: ContentType.Movie, movie: await this.tmdb.getMovie(movieId) };
    }

    return this.selector.select(source);
  }
}
