import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireActor } from "../../plugins/service-auth";
import {
  createUnitSchema,
  grantPermissionSchema,
  languageCodeSchema,
  updateUnitSchema,
} from "../../schemas/catalog";
import {
  revokeParamsSchema,
  seriesParamsSchema,
  seriesUrnParam,
  unitParamsSchema,
  unitUrnParam,
  userUrnParam,
} from "./params";

const getUnitQuerySchema = z.object({
  lang: languageCodeSchema.optional(),
  inherit: z.enum(["true", "false"]).default("true"),
});

const unitRevokeParamsSchema = unitParamsSchema.merge(revokeParamsSchema);

/** Registered under `/series/:seriesId/units`. */
export default async function unitRoutes(fastify: FastifyInstance) {
  const catalog = fastify.catalogService;

  const resolveUnitParams = (raw: unknown) => {
    const params = unitParamsSchema.parse(raw);
    return {
      seriesId: seriesUrnParam(params.seriesId),
      unitId: unitUrnParam(params.unitId),
    };
  };

  fastify.get("/", {
    schema: { params: seriesParamsSchema },
    handler: async (request) => {
      const params = seriesParamsSchema.parse(request.params);
      const items = await catalog.listUnits(seriesUrnParam(params.seriesId));
      return { items };
    },
  });

  fastify.post("/", {
    schema: { params: seriesParamsSchema, body: createUnitSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const params = seriesParamsSchema.parse(request.params);
      const body = createUnitSchema.parse(request.body);
      const seriesId = seriesUrnParam(params.seriesId);
      await catalog.getSeries(seriesId);
      const unit = await catalog.createUnit(actor, seriesId, body);
      return reply.code(201).send(unit);
    },
  });

  fastify.get("/:unitId", {
    schema: { params: unitParamsSchema, querystring: getUnitQuerySchema },
    handler: async (request) => {
      const { seriesId, unitId } = resolveUnitParams(request.params);
      const query = getUnitQuerySchema.parse(request.query);
      return catalog.getUnit(seriesId, unitId, {
        inherit: query.inherit === "true",
        language: query.lang,
      });
    },
  });

  fastify.patch("/:unitId", {
    schema: { params: unitParamsSchema, body: updateUnitSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const { seriesId, unitId } = resolveUnitParams(request.params);
      const body = updateUnitSchema.parse(request.body);
      await catalog.getUnit(seriesId, unitId);
      return catalog.updateUnit(actor, seriesId, unitId, body);
    },
  });

  fastify.delete("/:unitId", {
    schema: { params: unitParamsSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const { seriesId, unitId } = resolveUnitParams(request.params);
      await catalog.getUnit(seriesId, unitId);
      await catalog.deleteUnit(actor, seriesId, unitId);
      return reply.code(204).send();
    },
  });

  fastify.get("/:unitId/permissions", {
    schema: { params: unitParamsSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const { seriesId, unitId } = resolveUnitParams(request.params);
      await catalog.getUnit(seriesId, unitId);
      const permissions = await catalog.listPermissions(actor, unitId);
      return { targetUrn: unitId, ...permissions };
    },
  });

  fastify.post("/:unitId/permissions", {
    schema: { params: unitParamsSchema, body: grantPermissionSchema },
    handler: async (request, reply) => {
      const actor = requireActor(request);
      const { seriesId, unitId } = resolveUnitParams(request.params);
      const body = grantPermissionSchema.parse(request.body);
      await catalog.getUnit(seriesId, unitId);
      const editors = await catalog.grantPermission(
        actor,
        unitId,
        userUrnParam(body.userUrn)
      );
      return reply.code(201).send({ targetUrn: unitId, editors });
    },
  });

  fastify.delete("/:unitId/permissions/:userUrn", {
    schema: { params: unitRevokeParamsSchema },
    handler: async (request) => {
      const actor = requireActor(request);
      const params = unitRevokeParamsSchema.parse(request.params);
      const { seriesId, unitId } = resolveUnitParams(params);
      await catalog.getUnit(seriesId, unitId);
      const editors = await catalog.revokePermission(
        actor,
        unitId,
        userUrnParam(params.userUrn)
      );
      return { targetUrn: unitId, editors };
    },
  });
}
