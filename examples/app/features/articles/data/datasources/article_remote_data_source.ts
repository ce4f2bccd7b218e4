import { IHttpClient } from 'layered-app-kit';

import { ArticleModel, ArticleModels } from '../models/article_model';

/**
 * Throws data exceptions; the repository turns them into failures.
 */
export interface ArticleRemoteDataSource {
  fetchArticle(id: string): Promise<ArticleModel>;
  fetchArticles(): Promise<ArticleModel[]>;
}

export class HttpArticleRemoteDataSource implements ArticleRemoteDataSource {
  constructor(private readonly http: IHttpClient) {}

  async fetchArticle(id: string): Promise<ArticleModel> {
    return ArticleModels.decode(await this.http.get(`/articles/${encodeURIComponent(id)}`));
  }

  async fetchArticles(): Promise<ArticleModel[]> {
    return ArticleModels.decodeList(await this.http.get('/articles'));
  }
}
