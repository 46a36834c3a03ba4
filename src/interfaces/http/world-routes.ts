import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { snapshotObject } from '../../application/world-snapshot.js';

/**
 * Parses a path or query value to an integer.
 * Returns `undefined` for missing values, `NaN` for anything non-integral.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (value.trim() === '') return NaN;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read-only view of the world registry.
 *
 * GET /health                     liveness plus runtime state
 * GET /api/v1/objects             all tracked objects (?visible=true for visible ones)
 * GET /api/v1/objects/:object_id  single object by robot object id
 * GET /api/v1/faces               all tracked faces
 * GET /api/v1/faces/:face_id      single face by current face id
 */
async function worldRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { runtime } = fastify;
    return reply.status(200).send({
      status: runtime.isTornDown ? 'stopped' : 'ok',
      objects: runtime.world.objects().length,
      faces: runtime.world.faces().length,
      queued: runtime.queue.pending,
    });
  });

  fastify.get(
    '/api/v1/objects',
    async (request: FastifyRequest<{ Querystring: { visible?: string } }>, reply: FastifyReply) => {
      const { visible } = request.query;
      if (visible !== undefined && visible !== 'true' && visible !== 'false') {
        return reply.status(400).send({ error: 'visible must be true or false' });
      }

      const objects = fastify.runtime.world
        .objects()
        .filter((object) => visible === undefined || object.isVisible === (visible === 'true'));
      return reply.status(200).send({ data: objects.map(snapshotObject), total: objects.length });
    },
  );

  fastify.get(
    '/api/v1/objects/:object_id',
    async (request: FastifyRequest<{ Params: { object_id: string } }>, reply: FastifyReply) => {
      const objectId = safeInt(request.params.object_id);
      if (objectId === undefined || Number.isNaN(objectId)) {
        return reply.status(400).send({ error: 'object_id must be an integer' });
      }

      const object = fastify.runtime.world.getObject(objectId);
      if (object === undefined) {
        return reply.status(404).send({ error: 'Object not found' });
      }
      return reply.status(200).send(snapshotObject(object));
    },
  );

  fastify.get('/api/v1/faces', async (_request: FastifyRequest, reply: FastifyReply) => {
    const faces = fastify.runtime.world.faces();
    return reply.status(200).send({ data: faces.map(snapshotObject), total: faces.length });
  });

  fastify.get(
    '/api/v1/faces/:face_id',
    async (request: FastifyRequest<{ Params: { face_id: string } }>, reply: FastifyReply) => {
      const faceId = safeInt(request.params.face_id);
      if (faceId === undefined || Number.isNaN(faceId)) {
        return reply.status(400).send({ error: 'face_id must be an integer' });
      }

      const face = fastify.runtime.world.getFace(faceId);
      if (face === undefined) {
        return reply.status(404).send({ error: 'Face not found' });
      }
      return reply.status(200).send(snapshotObject(face));
    },
  );
}

export default fp(worldRoutes, {
  name: 'world-routes',
  dependencies: ['runtime'],
  fastify: '5.x',
});
