import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RequirementCatalog } from '../../services/catalog/RequirementCatalog.interface.js';
import { sendError } from '../errors.js';

export function createFrameworkHandler(catalog: RequirementCatalog) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const [framework, requirements] = await Promise.all([catalog.getFramework(), catalog.listRequirements()]);
      return reply.code(200).send({ framework, requirements });
    } catch (error) {
      return sendError(reply, error, 'Framework lookup');
    }
  };
}
