import { Controller, Injectable, ServiceLifetime, ViewState, ViewStates } from 'layered-app-kit';

import { Article } from '../../domain/entities/article';
import { GetArticles } from '../../domain/usecases/get_articles';

@Injectable({ lifetime: ServiceLifetime.Factory })
export class ArticleListController extends Controller {
  readonly articles = this.observable<ViewState<readonly Article[]>>(ViewStates.initial());

  constructor(private readonly getArticles: GetArticles) {
    super();
  }

  protected async onInit(): Promise<void> {
    await this.refresh();
  }

  async refresh(): Promise<void> {
    await this.load(this.articles, () => this.getArticles.execute());
  }

  /** Articles carrying `tag`, from the loaded list. */
  withTag(tag: string): readonly Article[] {
    const state = this.articles.value;
    return state.status === 'success' ? state.data.filter((a) => a.tags.includes(tag)) : [];
  }
}
