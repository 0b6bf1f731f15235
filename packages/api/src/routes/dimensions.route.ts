import type { FastifyInstance } from 'fastify';
import { recordBodySchema } from '@bankdw/core';
import type {
  ApplyResult,
  DimensionDefinition,
  DimensionRegistry,
  DimensionVersionManager,
} from '@bankdw/core';
import { serializeVersion } from './serialize.js';

interface RecordBody {
  natural_key: string;
  as_of_date: string;
  attributes: Record<string, unknown>;
}

interface BatchBody {
  records: RecordBody[];
}

const MAX_BATCH_SIZE = 5000;

const batchBodySchema = {
  type: 'object',
  required: ['records'],
  additionalProperties: false,
  properties: {
    records: { type: 'array', minItems: 1, maxItems: MAX_BATCH_SIZE, items: recordBodySchema },
  },
};

function serializeDefinition(definition: DimensionDefinition) {
  return {
    dimension_id: definition.dimension_id,
    table: `${definition.schema}.${definition.table}`,
    surrogate_key_column: definition.surrogate_key_column,
    natural_key_column: definition.natural_key_column,
    description: definition.description ?? null,
    attributes: definition.attributes.map((a) => ({
      name: a.name,
      type: a.type,
      tracked_as: a.tracked_as,
    })),
  };
}

function serializeApplyResult(result: ApplyResult) {
  return {
    dimension_id: result.dimension_id,
    natural_key: result.natural_key,
    as_of_date: result.as_of_date,
    verdict: result.verdict,
    attempts: result.attempts,
    changed: result.changed,
    current: serializeVersion(result.current),
    closed: result.closed ? serializeVersion(result.closed) : null,
  };
}

export function registerDimensionRoutes(
  app: FastifyInstance,
  manager: DimensionVersionManager,
  registry: DimensionRegistry,
): void {
  // GET /dimensions: dimension ids with their attribute policies
  app.get('/dimensions', async (_request, reply) => {
    return reply.send({ dimensions: registry.list().map(serializeDefinition) });
  });

  // POST /dimensions/:dimension_id/records: apply one as-of record
  app.post<{ Params: { dimension_id: string }; Body: RecordBody }>(
    '/dimensions/:dimension_id/records',
    { schema: { body: recordBodySchema } },
    async (request, reply) => {
      const result = await manager.apply({
        dimension_id: request.params.dimension_id,
        natural_key: request.body.natural_key,
        as_of_date: request.body.as_of_date,
        attributes: request.body.attributes,
      });

      const created = result.verdict === 'NEW_ENTITY' || result.verdict === 'TYPE2_VERSION';
      return reply.status(created ? 201 : 200).send(serializeApplyResult(result));
    },
  );

  // POST /dimensions/:dimension_id/records/batch: apply records in order
  app.post<{ Params: { dimension_id: string }; Body: BatchBody }>(
    '/dimensions/:dimension_id/records/batch',
    { schema: { body: batchBodySchema } },
    async (request, reply) => {
      const { dimension_id } = request.params;
      // Unknown dimension fails the request rather than every record
      registry.get(dimension_id);

      const summary = await manager.applyAll(
        request.body.records.map((record) => ({ ...record, dimension_id })),
      );
      request.log.info(
        { batchId: summary.batch_id, processed: summary.processed, failed: summary.failed },
        'batch applied',
      );
      return reply.send(summary);
    },
  );
}
