import { AppFailure, IUseCase, Result, Results, ValidationFailure } from 'layered-app-kit';

import { Article } from '../entities/article';
import { ArticleRepository } from '../repositories/article_repository';

export interface GetArticleParams {
  readonly id: string;
}

export class GetArticle implements IUseCase<GetArticleParams, Article> {
  constructor(private readonly repository: ArticleRepository) {}

  async execute(params: GetArticleParams): Promise<Result<AppFailure, Article>> {
    if (params.id.trim() === '') {
      return Results.failure(
        new ValidationFailure('Article id is required', { id: ['must not be empty'] }),
      );
    }
    return this.repository.getArticle(params.id);
  }
}
