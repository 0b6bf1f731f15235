import type { FastifyInstance } from 'fastify';
import { NaturalKeyNotFoundError } from '@bankdw/core';
import type { DimensionVersionManager } from '@bankdw/core';
import { serializeVersion } from './serialize.js';

interface VersionParams {
  dimension_id: string;
  natural_key: string;
}

export function registerVersionRoutes(
  app: FastifyInstance,
  manager: DimensionVersionManager,
): void {
  // Current version of a natural key
  app.get<{ Params: VersionParams }>(
    '/dimensions/:dimension_id/versions/:natural_key/current',
    async (request, reply) => {
      const { dimension_id, natural_key } = request.params;
      const version = await manager.currentVersion(dimension_id, natural_key);
      if (!version) {
        throw new NaturalKeyNotFoundError(dimension_id, natural_key);
      }
      return reply.send(serializeVersion(version));
    },
  );

  // Version effective on a date
  app.get<{ Params: VersionParams & { date: string } }>(
    '/dimensions/:dimension_id/versions/:natural_key/as-of/:date',
    async (request, reply) => {
      const { dimension_id, natural_key, date } = request.params;
      const version = await manager.versionAsOf(dimension_id, natural_key, date);
      if (!version) {
        throw new NaturalKeyNotFoundError(dimension_id, natural_key, date);
      }
      return reply.send(serializeVersion(version));
    },
  );

  // Full history, oldest first
  app.get<{ Params: VersionParams }>(
    '/dimensions/:dimension_id/versions/:natural_key',
    async (request, reply) => {
      const { dimension_id, natural_key } = request.params;
      const versions = await manager.allVersions(dimension_id, natural_key).toArray();
      if (versions.length === 0) {
        throw new NaturalKeyNotFoundError(dimension_id, natural_key);
      }
      return reply.send({
        dimension_id,
        natural_key: versions[0].natural_key,
        versions: versions.map(serializeVersion),
      });
    },
  );

  // Chain integrity report
  app.get<{ Params: VersionParams }>(
    '/dimensions/:dimension_id/versions/:natural_key/audit',
    async (request, reply) => {
      const { dimension_id, natural_key } = request.params;
      const report = await manager.auditNaturalKey(dimension_id, natural_key);
      return reply.send({ ...report, consistent: report.violations.length === 0 });
    },
  );
}
