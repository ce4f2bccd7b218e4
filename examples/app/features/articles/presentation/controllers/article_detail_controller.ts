import { AppFailure, Controller, Result, ViewState, ViewStates } from 'layered-app-kit';

import { Article } from '../../domain/entities/article';
import { GetArticle } from '../../domain/usecases/get_article';

export class ArticleDetailController extends Controller {
  readonly article = this.observable<ViewState<Article>>(ViewStates.initial());

  constructor(private readonly getArticle: GetArticle) {
    super();
  }

  show(id: string): Promise<Result<AppFailure, Article>> {
    return this.load(this.article, () => this.getArticle.execute({ id }));
  }
}
