import type { FastifyInstance } from 'fastify';
import { createSuccessResponse } from '../types.js';
import { buildPlanBodySchema, limitQuerySchema } from '../types/api.js';
import { parseOrReply } from './validation.js';
import type { PlanningService } from '../../planning/index.js';

export const PLANNING_PREFIX = '/api/v1/planning';

/**
 * Register rule/chain catalog and plan routes
 */
export function registerPlanningRoutes(app: FastifyInstance, planning: PlanningService): void {
  /**
   * GET /api/v1/planning/rules - Current rule catalog, in match order
   */
  app.get(`${PLANNING_PREFIX}/rules`, async (request, reply) => {
    const rules = await planning.listRules();
    return reply.send(createSuccessResponse(rules, request.id));
  });

  /**
   * PUT /api/v1/planning/rules - Replace the whole rule catalog
   */
  app.put(`${PLANNING_PREFIX}/rules`, async (request, reply) => {
    const rules = await planning.replaceRules(request.body);
    return reply.send(createSuccessResponse(rules, request.id));
  });

  app.get(`${PLANNING_PREFIX}/chains`, async (request, reply) => {
    const chains = await planning.listChains();
    return reply.send(createSuccessResponse(chains, request.id));
  });

  app.put(`${PLANNING_PREFIX}/chains`, async (request, reply) => {
    const chains = await planning.replaceChains(request.body);
    return reply.send(createSuccessResponse(chains, request.id));
  });

  /**
   * POST /api/v1/planning/plan - Build a plan from a question
   */
  app.post(`${PLANNING_PREFIX}/plan`, async (request, reply) => {
    const body = parseOrReply(buildPlanBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const plan = await planning.buildPlan(body);
    return reply.status(201).send(createSuccessResponse(plan, request.id));
  });

  /**
   * GET /api/v1/planning/plans - Plan history, newest first
   */
  app.get(`${PLANNING_PREFIX}/plans`, async (request, reply) => {
    const query = parseOrReply(limitQuerySchema, request.query, 'query parameters', request, reply);
    if (!query) {
      return reply;
    }
    const plans = await planning.listPlanHistory(query.limit);
    return reply.send(createSuccessResponse(plans, request.id));
  });
}
