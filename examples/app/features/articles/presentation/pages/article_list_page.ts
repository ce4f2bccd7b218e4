import { describeFailure, ViewState, ViewStates } from 'layered-app-kit';

import { Article } from '../../domain/entities/article';

export function renderArticle(article: Article): string {
  const tags = article.tags.length > 0 ? ` [${article.tags.join(', ')}]` : '';
  return `${article.title} by ${article.author}${tags}`;
}

/**
 * Text rendering of the article list screen.
 */
export function renderArticleList(state: ViewState<readonly Article[]>): string {
  return ViewStates.match(state, {
    initial: () => '',
    loading: () => 'Loading articles…',
    success: (articles) =>
      articles.length === 0 ? 'No articles yet.' : articles.map(renderArticle).join('\n'),
    failure: (failure) => describeFailure(failure),
  });
}
