import { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import { loadConfig } from "../config";
import { getRedis, shutdownRedis } from "../lib/redis";
import {
  createCatalogRepository,
  type CatalogRepository,
} from "../repositories/catalog-repository";
import {
  RedisCatalogEventsPublisher,
  type CatalogEventsPublisher,
} from "../services/catalog-events";
import { CatalogService } from "../services/catalog-service";
import { KeyedLock } from "../utils/keyed-lock";

declare module "fastify" {
  interface FastifyInstance {
    catalogService: CatalogService;
  }
}

export type CatalogPluginOptions = {
  repository?: CatalogRepository;
  /** null disables event publishing even when Redis is configured. */
  eventsPublisher?: CatalogEventsPublisher | null;
};

function resolveEventsPublisher(
  options: CatalogPluginOptions
): CatalogEventsPublisher | undefined {
  if (options.eventsPublisher !== undefined) {
    return options.eventsPublisher ?? undefined;
  }
  const redis = getRedis();
  if (!redis) {
    return undefined;
  }
  return new RedisCatalogEventsPublisher(
    redis,
    loadConfig().CATALOG_EVENT_STREAM_KEY
  );
}

async function catalogPlugin(
  fastify: FastifyInstance,
  options: CatalogPluginOptions
) {
  const config = loadConfig();
  const repository = options.repository ?? createCatalogRepository(config);

  const catalogService = new CatalogService({
    repository,
    locks: new KeyedLock("catalog"),
    eventsPublisher: resolveEventsPublisher(options),
  });

  fastify.decorate("catalogService", catalogService);

  fastify.addHook("onReady", async () => {
    try {
      await repository.init();
    } catch (error) {
      fastify.log.error({ err: error }, "Catalog repository failed to initialize");
      throw error;
    }
  });

  fastify.addHook("onClose", async () => {
    if (!options.repository) {
      await repository.close();
    }
    await shutdownRedis();
  });
}

export default fp(catalogPlugin, {
  name: "catalog",
});
