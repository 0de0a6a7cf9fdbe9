import fp from "fastify-plugin";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { recordHttpRequest } from "../observability/metrics";

function normalizeRoute(route?: string) {
  if (!route) {
    return "unmatched";
  }
  if (route.startsWith("/api/v1/catalog")) {
    return route.replace("/api/v1/catalog", "");
  }
  return route;
}

export default fp(async function metricsPlugin(fastify: FastifyInstance) {
  const requestStarts = new WeakMap<FastifyRequest, bigint>();

  fastify.addHook("onRequest", (request, _reply, done) => {
    requestStarts.set(request, process.hrtime.bigint());
    done();
  });

  fastify.addHook("onResponse", (request, reply, done) => {
    const start = requestStarts.get(request);
    if (start !== undefined) {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      recordHttpRequest(durationMs, {
        method: request.method,
        route: normalizeRoute(request.routeOptions.url),
        statusClass: `${Math.floor(reply.statusCode / 100)}xx`,
      });
    }
    done();
  });
}, { name: "metrics" });
