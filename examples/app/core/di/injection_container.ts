/**
 * Composition root: binds every contract of the app to its implementation.
 */

import {
  createToken,
  defineModule,
  FetchFunction,
  FetchHttpClient,
  IAppModule,
  IHttpClient,
  IKeyValueStore,
  INetworkInfo,
  DnsNetworkInfo,
  LOGGER,
  MemoryKeyValueStore,
  RepositoryFetcher,
} from 'layered-app-kit';

import {
  ArticleLocalDataSource,
  StoredArticleLocalDataSource,
} from '../../features/articles/data/datasources/article_local_data_source';
import {
  ArticleRemoteDataSource,
  HttpArticleRemoteDataSource,
} from '../../features/articles/data/datasources/article_remote_data_source';
import { ArticleRepositoryImpl } from '../../features/articles/data/repositories/article_repository_impl';
import { ARTICLE_REPOSITORY } from '../../features/articles/domain/repositories/article_repository';
import { GetArticle } from '../../features/articles/domain/usecases/get_article';
import { GetArticles } from '../../features/articles/domain/usecases/get_articles';
import { ArticleDetailController } from '../../features/articles/presentation/controllers/article_detail_controller';
import { ArticleListController } from '../../features/articles/presentation/controllers/article_list_controller';
import { ApiConfig } from '../network/api_config';

export const API_CONFIG = createToken<ApiConfig>('ApiConfig');
export const HTTP_CLIENT = createToken<IHttpClient>('IHttpClient');
export const NETWORK_INFO = createToken<INetworkInfo>('INetworkInfo');
export const KEY_VALUE_STORE = createToken<IKeyValueStore>('IKeyValueStore');
export const ARTICLE_REMOTE = createToken<ArticleRemoteDataSource>('ArticleRemoteDataSource');
export const ARTICLE_LOCAL = createToken<ArticleLocalDataSource>('ArticleLocalDataSource');

export interface CoreOverrides {
  /** Replaces the global fetch, e.g. in tests */
  fetch?: FetchFunction;
  networkInfo?: INetworkInfo;
  store?: IKeyValueStore;
}

export function coreModule(config: ApiConfig, overrides: CoreOverrides = {}): IAppModule {
  return defineModule('core', (services) => {
    services.addInstance(API_CONFIG, config);

    services.addLazySingleton(
      HTTP_CLIENT,
      (r) =>
        new FetchHttpClient({
          baseUrl: config.baseUrl,
          timeoutMs: config.timeoutMs,
          fetch: overrides.fetch,
          logger: r.getService(LOGGER),
        }),
      { dependsOn: [LOGGER] },
    );

    if (overrides.networkInfo) {
      services.addInstance(NETWORK_INFO, overrides.networkInfo);
    } else {
      services.addLazySingleton(NETWORK_INFO, (r) => new DnsNetworkInfo({ logger: r.getService(LOGGER) }), {
        dependsOn: [LOGGER],
      });
    }

    services.addInstance(KEY_VALUE_STORE, overrides.store ?? new MemoryKeyValueStore());

    services.addLazySingleton(
      RepositoryFetcher,
      (r) =>
        new RepositoryFetcher({
          networkInfo: r.getService(NETWORK_INFO),
          logger: r.getService(LOGGER),
        }),
      { dependsOn: [NETWORK_INFO, LOGGER] },
    );
  });
}

export const articlesModule: IAppModule = defineModule('articles', (services) => {
  // Data
  services.addLazySingleton(
    ARTICLE_REMOTE,
    (r) => new HttpArticleRemoteDataSource(r.getService(HTTP_CLIENT)),
    { dependsOn: [HTTP_CLIENT] },
  );
  services.addLazySingleton(
    ARTICLE_LOCAL,
    (r) => new StoredArticleLocalDataSource(r.getService(KEY_VALUE_STORE), r.getService(API_CONFIG).cacheTtlMs),
    { dependsOn: [KEY_VALUE_STORE, API_CONFIG] },
  );
  services.addLazySingleton(
    ARTICLE_REPOSITORY,
    (r) =>
      new ArticleRepositoryImpl(
        r.getService(ARTICLE_REMOTE),
        r.getService(ARTICLE_LOCAL),
        r.getService(RepositoryFetcher),
      ),
    { dependsOn: [ARTICLE_REMOTE, ARTICLE_LOCAL, RepositoryFetcher] },
  );

  // Domain
  services.addLazySingleton(GetArticle, (r) => new GetArticle(r.getService(ARTICLE_REPOSITORY)), {
    dependsOn: [ARTICLE_REPOSITORY],
  });
  services.addLazySingleton(GetArticles, (r) => new GetArticles(r.getService(ARTICLE_REPOSITORY)), {
    dependsOn: [ARTICLE_REPOSITORY],
  });

  // Presentation: one controller per screen
  services.addClass(ArticleListController, ArticleListController);
  services.addFactory(ArticleDetailController, (r) => new ArticleDetailController(r.getService(GetArticle)), {
    dependsOn: [GetArticle],
  });
});

export function appModules(config: ApiConfig, overrides: CoreOverrides = {}): IAppModule[] {
  return [coreModule(config, overrides), articlesModule];
}
