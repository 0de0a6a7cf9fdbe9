import type { FastifyInstance } from "fastify";
import { requireActor } from "../../plugins/service-auth";
import {
  createSeriesSchema,
  grantPermissionSchema,
  listQuerySchema,
  transferOwnershipSchema,
  updateSeriesSchema,
} from "../../schemas/catalog";
import {
  revokeParamsSchema,
  seriesParamsSchema,
  seriesUrnParam,
  userUrnParam,
} from "./params";

const seriesRevokeParamsSchema = seriesParamsSchema.merge(revokeParamsSchema);

export default async function seriesRoutes(fastify: FastifyInstance) {
  const catalog = fastify.catalogService;

  fastify.get("/", {
    schema: { querystring: listQuerySchema },
    handler: async (request) => {
      const query = listQuerySchema.parse(request.query);
      return catalog.listSeries({ limit: query.limit, cursor: query.cursor });
    },
  });

  fastify.post("/", {
    schema: { body: createSeriesSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const body = createSeriesSchema.parse(request.body);
      const series = await catalog.createSeries(actor, body);
      return reply.code(201).send(series);
    },
  });

  fastify.get("/:seriesId", {
    schema: { params: seriesParamsSchema },
    handler: async (request) => {
      const params = seriesParamsSchema.parse(request.params);
      return catalog.getSeries(seriesUrnParam(params.seriesId));
    },
  });

  fastify.patch("/:seriesId", {
    schema: { params: seriesParamsSchema, body: updateSeriesSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const body = updateSeriesSchema.parse(request.body);
      return catalog.updateSeries(actor, seriesUrnParam(params.seriesId), body);
    },
  });

  fastify.delete("/:seriesId", {
    schema: { params: seriesParamsSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      await catalog.deleteSeries(actor, seriesUrnParam(params.seriesId));
      return reply.code(204).send();
    },
  });

  fastify.post("/:seriesId/recompute", {
    schema: { params: seriesParamsSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const seriesId = seriesUrnParam(params.seriesId);
      await catalog.getSeries(seriesId);
      if (!(await catalog.canEdit(actor, seriesId))) {
        throw fastify.httpErrors.forbidden(
          `You do not have permission to edit ${seriesId}`
        );
      }
      return catalog.recomputeSeries(seriesId);
    },
  });

  fastify.post("/:seriesId/transfer-ownership", {
    schema: { params: seriesParamsSchema, body: transferOwnershipSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const body = transferOwnershipSchema.parse(request.body);
      return catalog.transferOwnership(
        actor,
        seriesUrnParam(params.seriesId),
        userUrnParam(body.newOwnerUrn)
      );
    },
  });

  fastify.get("/:seriesId/permissions", {
    schema: { params: seriesParamsSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const targetUrn = seriesUrnParam(params.seriesId);
      const permissions = await catalog.listPermissions(actor, targetUrn);
      return { targetUrn, ...permissions };
    },
  });

  fastify.post("/:seriesId/permissions", {
    schema: { params: seriesParamsSchema, body: grantPermissionSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const body = grantPermissionSchema.parse(request.body);
      const targetUrn = seriesUrnParam(params.seriesId);
      await catalog.getSeries(targetUrn);
      const editors = await catalog.grantPermission(
        actor,
        targetUrn,
        userUrnParam(body.userUrn)
      );
      return reply.code(201).send({ targetUrn, editors });
    },
  });

  fastify.delete("/:seriesId/permissions/:userUrn", {
    schema: { params: seriesRevokeParamsSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = seriesRevokeParamsSchema.parse(request.params);
      const targetUrn = seriesUrnParam(params.seriesId);
      await catalog.getSeries(targetUrn);
      const editors = await catalog.revokePermission(
        actor,
        targetUrn,
        userUrnParam(params.userUrn)
      );
      return { targetUrn, editors };
    },
  });
}

