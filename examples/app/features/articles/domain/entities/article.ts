import { defineEntity } from 'layered-app-kit';

export interface Article {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  readonly author: string;
  /** ISO-8601 timestamp */
  readonly publishedAt: string;
  readonly tags: readonly string[];
}

export const Articles = defineEntity<Article>('Article', (article) => {
  const problems: string[] = [];
  if (article.id.trim() === '') problems.push('id must not be empty');
  if (article.title.trim() === '') problems.push('title must not be empty');
  if (Number.isNaN(Date.parse(article.publishedAt))) {
    problems.push('publishedAt must be an ISO-8601 timestamp');
  }
  return problems;
});
