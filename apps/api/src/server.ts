import type { CatalogApiClient } from "@pagewise/catalog-api";
import { CatalogApiServerError } from "@pagewise/catalog-api";
import type { IngestResult } from "@pagewise/ingest";
import { pushEnvelopeSchema, unpackEnvelope } from "@pagewise/ingest";
import type { PinoLoggerOptions } from "@pagewise/observability";
import type { JobStore } from "@pagewise/tasks";
import { TaskQueueError } from "@pagewise/tasks";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";
import {
  OpenAPIRegistry,
  OpenApiGeneratorV3,
  extendZodWithOpenApi,
} from "@asteasolutions/zod-to-openapi";

extendZodWithOpenApi(z);

export interface IngestHandler {
  ingest(items: readonly unknown[]): Promise<IngestResult>;
}

const PUSH_KINDS = ["entities", "activity", "owners"] as const;

export type PushKind = (typeof PUSH_KINDS)[number];

const envelopeBodySchema = pushEnvelopeSchema.openapi({
  description: "Pub/Sub push envelope; `message.data` is base64 JSON of an item batch.",
});

const ingestResponseSchema = z.object({
  indexed: z.number().int().nonnegative(),
  tasks: z.array(
    z.string().openapi({
      description: "Job handle `queues/<queue>/jobs/<name>`, or `duplicate`.",
    }),
  ),
});

const errorResponseSchema = z.object({
  error: z.string(),
});

const envelopeErrorResponseSchema = z.object({
  error: z.string(),
  issues: z.array(z.object({ path: z.string(), message: z.string() })),
});

const healthResponseSchema = z.object({
  ok: z.boolean(),
  checks: z
    .object({
      catalog_api: z.boolean(),
      job_store: z.boolean(),
    })
    .optional(),
});

const PUSH_ROUTES: Record<PushKind, { path: string; description: string }> = {
  entities: { path: "/pubsub/entities/handle", description: "Catalog entity batch" },
  activity: { path: "/pubsub/activity/handle", description: "Owner activity batch" },
  owners: { path: "/pubsub/owners/handle", description: "Owner acquisition batch" },
};

function isRetryableFailure(error: unknown): boolean {
  return error instanceof CatalogApiServerError || error instanceof TaskQueueError;
}

export function buildServer(params: {
  loggerOptions: PinoLoggerOptions;
  handlers: Record<PushKind, IngestHandler>;
  readiness: {
    catalog: Pick<CatalogApiClient, "isReady">;
    jobStore: Pick<JobStore, "ping">;
  };
}): FastifyInstance {
  const server = Fastify({
    logger: params.loggerOptions,
  });

  const registry = new OpenAPIRegistry();

  registry.registerPath({
    method: "get",
    path: "/healthz",
    responses: {
      200: {
        description: "Catalog API and job store reachable",
        content: { "application/json": { schema: healthResponseSchema } },
      },
      503: {
        description: "A dependency is unreachable",
        content: { "application/json": { schema: healthResponseSchema } },
      },
    },
  });

  for (const kind of PUSH_KINDS) {
    const route = PUSH_ROUTES[kind];
    registry.registerPath({
      method: "post",
      path: route.path,
      description: route.description,
      request: {
        body: {
          content: { "application/json": { schema: envelopeBodySchema } },
        },
      },
      responses: {
        200: {
          description: "Batch acknowledged, including unreadable payloads",
          content: { "application/json": { schema: ingestResponseSchema } },
        },
        422: {
          description: "Invalid push envelope",
          content: { "application/json": { schema: envelopeErrorResponseSchema } },
        },
        500: {
          description: "Batch failed and should be redelivered",
          content: { "application/json": { schema: errorResponseSchema } },
        },
      },
    });
  }

  const openApiDocument = new OpenApiGeneratorV3(registry.definitions).generateDocument({
    openapi: "3.0.3",
    info: { title: "pagewise indexer", version: "0.1.0" },
  });

  server.get("/healthz", async (request, reply) => {
    const [catalogApi, jobStore] = await Promise.all([
      params.readiness.catalog.isReady().catch((error: unknown) => {
        request.log.warn({ error }, "catalog API readiness check failed");
        return false;
      }),
      params.readiness.jobStore.ping().then(
        () => true,
        (error: unknown) => {
          request.log.warn({ error }, "job store readiness check failed");
          return false;
        },
      ),
    ]);

    if (catalogApi && jobStore) {
      return reply.status(200).send({ ok: true });
    }
    return reply.status(503).send({
      ok: false,
      checks: { catalog_api: catalogApi, job_store: jobStore },
    });
  });

  server.get("/openapi.json", (_request, reply) => {
    return reply.status(200).send(openApiDocument);
  });

  async function handlePush(
    kind: PushKind,
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply> {
    const envelope = pushEnvelopeSchema.safeParse(request.body);
    if (!envelope.success) {
      return reply.status(422).send({
        error: "invalid push envelope",
        issues: envelope.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    const unpacked = unpackEnvelope(envelope.data, request.log);
    if (!unpacked.ok) {
      // Unreadable payloads are acknowledged and dropped.
      return reply.status(200).send({ indexed: 0, tasks: [] });
    }

    try {
      const result = await params.handlers[kind].ingest(unpacked.items);
      return await reply.status(200).send(result);
    } catch (error) {
      if (isRetryableFailure(error)) {
        request.log.error(
          { error, kind, messageId: envelope.data.message.message_id },
          "push batch failed",
        );
        return reply.status(500).send({ error: "Batch failed; retry later" });
      }
      request.log.error({ error, kind }, "unexpected push batch failure");
      return reply.status(500).send({ error: "Internal server error" });
    }
  }

  for (const kind of PUSH_KINDS) {
    server.post(PUSH_ROUTES[kind].path, (request, reply) => handlePush(kind, request, reply));
  }

  return server;
}
