import { AppFailure, RepositoryFetcher, Result } from 'layered-app-kit';

import { Article } from '../../domain/entities/article';
import { ArticleRepository } from '../../domain/repositories/article_repository';
import { ArticleLocalDataSource } from '../datasources/article_local_data_source';
import { ArticleRemoteDataSource } from '../datasources/article_remote_data_source';
import { ArticleModels } from '../models/article_model';

export class ArticleRepositoryImpl implements ArticleRepository {
  constructor(
    private readonly remote: ArticleRemoteDataSource,
    private readonly local: ArticleLocalDataSource,
    private readonly fetcher: RepositoryFetcher,
  ) {}

  getArticle(id: string): Promise<Result<AppFailure, Article>> {
    return this.fetcher.fetch({
      label: `getArticle(${id})`,
      remote: () => this.remote.fetchArticle(id),
      readCache: () => this.local.readArticle(id),
      writeCache: (model) => this.local.writeArticle(model),
      toEntity: ArticleModels.toEntity,
    });
  }

  getArticles(): Promise<Result<AppFailure, readonly Article[]>> {
    return this.fetcher.fetch({
      label: 'getArticles',
      remote: () => this.remote.fetchArticles(),
      readCache: () => this.local.readArticles(),
      writeCache: (models) => this.local.writeArticles(models),
      toEntity: (models): readonly Article[] => models.map(ArticleModels.toEntity),
    });
  }
}
