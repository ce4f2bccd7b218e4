import { AppFailure, createToken, Result } from 'layered-app-kit';

import { Article } from '../entities/article';

export interface ArticleRepository {
  getArticle(id: string): Promise<Result<AppFailure, Article>>;
  getArticles(): Promise<Result<AppFailure, readonly Article[]>>;
}

export const ARTICLE_REPOSITORY = createToken<ArticleRepository>('ArticleRepository');
