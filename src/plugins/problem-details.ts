import fp from "fastify-plugin";
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import { CatalogServiceError, type CatalogErrorCode } from "../services/catalog-service";
import { PermissionError } from "../services/permission-resolver";
import { createErrorUrn, unwrapUrn, UrnError } from "../utils/urn";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type Problem = {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance: string;
};

type ProblemShape = {
  status: number;
  code: string;
  detail: string;
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict",
  412: "Precondition Failed",
  413: "Payload Too Large",
  415: "Unsupported Media Type",
  429: "Too Many Requests",
  500: "Internal Server Error",
};

const CODES: Record<number, string> = {
  400: "bad-request",
  401: "unauthorized",
  403: "forbidden",
  404: "not-found",
  409: "conflict",
  412: "precondition-failed",
  413: "payload-too-large",
  415: "unsupported-media-type",
  429: "too-many-requests",
};

const SERVICE_STATUS: Record<CatalogErrorCode, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  FAILED_PRECONDITION: 412,
  INVALID_ARGUMENT: 400,
  FORBIDDEN: 403,
};

function describeZodError(error: ZodError) {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

function toProblemShape(error: FastifyError | Error): ProblemShape {
  if (error instanceof ZodError) {
    return { status: 400, code: "validation", detail: describeZodError(error) };
  }
  if (error instanceof UrnError) {
    return { status: 400, code: "invalid-urn", detail: error.message };
  }
  if (error instanceof CatalogServiceError || error instanceof PermissionError) {
    const status = SERVICE_STATUS[error.code];
    return { status, code: CODES[status], detail: error.message };
  }
  if ("validation" in error && error.validation) {
    return { status: 400, code: "validation", detail: error.message };
  }
  const statusCode = "statusCode" in error ? error.statusCode : undefined;
  if (typeof statusCode === "number" && statusCode >= 400 && statusCode < 500) {
    return {
      status: statusCode,
      code: CODES[statusCode] ?? "client-error",
      detail: error.message,
    };
  }
  return {
    status: 500,
    code: "internal-error",
    detail: "An unexpected error occurred",
  };
}

export function buildProblem(
  shape: ProblemShape,
  instance: string
): Problem {
  return {
    type: unwrapUrn(createErrorUrn(shape.code)),
    title: TITLES[shape.status] ?? "Error",
    status: shape.status,
    detail: shape.detail.trim() || "An error occurred processing your request.",
    instance: instance.trim() || "/",
  };
}

function sendProblem(
  request: FastifyRequest,
  reply: FastifyReply,
  shape: ProblemShape
) {
  const path = request.url.split("?")[0];
  return reply
    .status(shape.status)
    .type(PROBLEM_CONTENT_TYPE)
    .send(buildProblem(shape, path));
}

async function problemDetailsPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler((error, request, reply) => {
    const shape = toProblemShape(error);
    if (shape.status >= 500) {
      request.log.error({ err: error }, "Request failed");
    } else {
      request.log.warn(
        { problem: shape.code, detail: shape.detail },
        "Request rejected"
      );
    }
    return sendProblem(request, reply, shape);
  });

  fastify.setNotFoundHandler((request, reply) =>
    sendProblem(request, reply, {
      status: 404,
      code: "not-found",
      detail: `Route ${request.method} ${request.url.split("?")[0]} not found`,
    })
  );
}

export default fp(problemDetailsPlugin, { name: "problem-details" });
