/**
 * Starts the app, prints the article list, and stops.
 *
 *   API_BASE_URL=https://example.test/api tsx examples/app/main.ts
 */

import { createConsoleLogger, createHost } from 'layered-app-kit';

import { appModules } from './core/di/injection_container';
import { apiConfigFromEnv } from './core/network/api_config';
import { ArticleListController } from './features/articles/presentation/controllers/article_list_controller';
import { renderArticleList } from './features/articles/presentation/pages/article_list_page';

async function run(): Promise<void> {
  const host = createHost({
    name: 'articles-app',
    logger: createConsoleLogger({ prefix: 'articles-app' }),
  });
  for (const module of appModules(apiConfigFromEnv())) {
    host.addModule(module);
  }

  const services = await host.start();
  const controller = services.getService(ArticleListController);
  try {
    await controller.init();
    process.stdout.write(`${renderArticleList(controller.articles.value)}\n`);
  } finally {
    await controller.close();
    await host.stop();
  }
}

if (require.main === module) {
  run().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
