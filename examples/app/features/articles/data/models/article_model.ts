import { defineModel } from 'layered-app-kit';
import * as z from 'zod';

import { Article, Articles } from '../../domain/entities/article';

export const articleModelSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  body: z.string(),
  author: z.object({
    name: z.string(),
  }),
  published_at: z.string(),
  tags: z.array(z.string()).default([]),
});

/** The wire shape of an article */
export type ArticleModel = z.infer<typeof articleModelSchema>;

export const ArticleModels = defineModel<ArticleModel, Article>({
  name: 'ArticleModel',
  schema: articleModelSchema,
  toEntity: (model) =>
    Articles.create({
      id: model.id,
      title: model.title,
      body: model.body,
      author: model.author.name,
      publishedAt: model.published_at,
      tags: model.tags,
    }),
  fromEntity: (article) => ({
    id: article.id,
    title: article.title,
    body: article.body,
    author: { name: article.author },
    published_at: article.publishedAt,
    tags: [...article.tags],
  }),
});
