import fp from "fastify-plugin";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { loadConfig } from "../config";
import type { Actor } from "../services/catalog-service";
import { normalizeUserUrn, unwrapUrn } from "../utils/urn";

function firstHeader(request: FastifyRequest, name: string) {
  const value = request.headers[name];
  if (Array.isArray(value)) {
    return value[0];
  }
  return typeof value === "string" ? value : undefined;
}

function extractToken(request: FastifyRequest) {
  const bearer = request.headers.authorization;
  if (typeof bearer === "string" && bearer.startsWith("Bearer ")) {
    return bearer.slice("Bearer ".length).trim();
  }
  return firstHeader(request, "x-service-token");
}

async function ensureAuthorized(
  request: FastifyRequest,
  reply: FastifyReply,
  expectedToken?: string
) {
  if (!expectedToken) {
    return;
  }
  const token = extractToken(request);
  if (!token) {
    throw reply.server.httpErrors.unauthorized("Missing service token");
  }
  if (token !== expectedToken) {
    throw reply.server.httpErrors.forbidden("Invalid service token");
  }
}

/**
 * The gateway authenticates end users and forwards who they are; this
 * service only trusts the forwarded headers.
 */
export function requireActor(request: FastifyRequest): Actor {
  const userHeader = firstHeader(request, "x-user-urn")?.trim();
  if (!userHeader) {
    throw request.server.httpErrors.unauthorized("Missing x-user-urn header");
  }
  const userUrn = unwrapUrn(normalizeUserUrn(userHeader));

  const rolesHeader = request.headers["x-user-roles"];
  const roles = Array.isArray(rolesHeader)
    ? rolesHeader
    : typeof rolesHeader === "string"
      ? rolesHeader
        .split(",")
        .map((role) => role.trim())
        .filter(Boolean)
      : [];

  return {
    userUrn,
    isAdmin: roles.some((role) => role.toLowerCase() === "admin"),
  };
}

const serviceAuthPlugin = fp(async function serviceAuthPlugin(
  fastify: FastifyInstance
) {
  const config = loadConfig();

  fastify.addHook("onRequest", async (request, reply) => {
    if (request.url === "/health") {
      return;
    }
    await ensureAuthorized(request, reply, config.SERVICE_AUTH_TOKEN);
  });
}, { name: "service-auth" });

export default serviceAuthPlugin;
