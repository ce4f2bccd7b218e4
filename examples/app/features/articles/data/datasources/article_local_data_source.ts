import { CacheException, errorMessage, IKeyValueStore } from 'layered-app-kit';

import { ArticleModel, ArticleModels } from '../models/article_model';

const LIST_KEY = 'articles:all';
const itemKey = (id: string) => `articles:${id}`;

export interface ArticleLocalDataSource {
  readArticle(id: string): Promise<ArticleModel | undefined>;
  writeArticle(model: ArticleModel): Promise<void>;
  readArticles(): Promise<ArticleModel[] | undefined>;
  writeArticles(models: readonly ArticleModel[]): Promise<void>;
}

/**
 * Keeps the last fetched copies as JSON text in a key-value store.
 */
export class StoredArticleLocalDataSource implements ArticleLocalDataSource {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly ttlMs?: number,
  ) {}

  async readArticle(id: string): Promise<ArticleModel | undefined> {
    const text = await this.store.get(itemKey(id));
    return text === undefined ? undefined : this.decode(() => ArticleModels.parse(text));
  }

  async writeArticle(model: ArticleModel): Promise<void> {
    await this.store.set(itemKey(model.id), ArticleModels.stringify(model), this.ttlMs);
  }

  async readArticles(): Promise<ArticleModel[] | undefined> {
    const text = await this.store.get(LIST_KEY);
    return text === undefined
      ? undefined
      : this.decode(() => ArticleModels.decodeList(JSON.parse(text)));
  }

  async writeArticles(models: readonly ArticleModel[]): Promise<void> {
    await this.store.set(LIST_KEY, JSON.stringify(models), this.ttlMs);
    for (const model of models) {
      await this.writeArticle(model);
    }
  }

  private decode<T>(read: () => T): T {
    try {
      return read();
    } catch (error) {
      throw new CacheException(`Stored articles are unreadable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
