import type { FastifyInstance } from "fastify";
import seriesRoutes from "./series";
import unitRoutes from "./units";

export default async function catalogRoutes(fastify: FastifyInstance) {
  await fastify.register(seriesRoutes, { prefix: "/series" });
  await fastify.register(unitRoutes, { prefix: "/series/:seriesId/units" });
}
