import { AppFailure, IUseCase, NoParams, Result, Results } from 'layered-app-kit';

import { Article } from '../entities/article';
import { ArticleRepository } from '../repositories/article_repository';

/**
 * All articles, newest first.
 */
export class GetArticles implements IUseCase<NoParams, readonly Article[]> {
  constructor(private readonly repository: ArticleRepository) {}

  async execute(): Promise<Result<AppFailure, readonly Article[]>> {
    const result = await this.repository.getArticles();
    return Results.map(result, (articles) =>
      [...articles].sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt)),
    );
  }
}
