import Fastify from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
} from "fastify-type-provider-zod";
import sensible from "@fastify/sensible";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import { loadConfig } from "./config";
import serviceAuthPlugin from "./plugins/service-auth";
import metricsPlugin from "./plugins/metrics";
import problemDetailsPlugin from "./plugins/problem-details";
import catalogPlugin, { type CatalogPluginOptions } from "./plugins/catalog";
import catalogRoutes from "./routes/catalog";

export const API_PREFIX = "/api/v1/catalog";

export type BuildAppOptions = CatalogPluginOptions;

export async function buildApp(options: BuildAppOptions = {}) {
  const config = loadConfig();

  const app = Fastify({
    logger: {
      level: config.NODE_ENV === "test" ? "silent" : config.LOG_LEVEL,
      transport:
        config.NODE_ENV === "development"
          ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
            },
          }
          : undefined,
    },
    trustProxy: true,
    bodyLimit: config.HTTP_BODY_LIMIT,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(sensible);
  await app.register(cors, { origin: false });
  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(metricsPlugin);
  await app.register(problemDetailsPlugin);
  await app.register(serviceAuthPlugin);
  await app.register(catalogPlugin, options);
  await app.register(catalogRoutes, { prefix: API_PREFIX });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
