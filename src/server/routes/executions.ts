import type { FastifyInstance } from 'fastify';
import { createSuccessResponse } from '../types.js';
import {
  cancelBodySchema,
  executionIdParamsSchema,
  executionLogQuerySchema,
  executionRecordBodySchema,
  limitQuerySchema,
  runBodySchema,
  startExecutionBodySchema,
  taskActionBodySchema,
} from '../types/api.js';
import { parseOrReply } from './validation.js';
import { PLANNING_PREFIX } from './planning.js';
import type { ExecutionEngine, ExecutionLog } from '../../orchestrator/index.js';

/**
 * Register execution lifecycle and execution log routes
 */
export function registerExecutionRoutes(
  app: FastifyInstance,
  engine: ExecutionEngine,
  executionLog: ExecutionLog
): void {
  /**
   * POST /api/v1/planning/executions/start - Start from a plan or a question
   */
  app.post(`${PLANNING_PREFIX}/executions/start`, async (request, reply) => {
    const body = parseOrReply(startExecutionBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const execution = await engine.startExecution(body);
    return reply.status(201).send(createSuccessResponse(execution, request.id));
  });

  app.get(`${PLANNING_PREFIX}/executions`, async (request, reply) => {
    const query = parseOrReply(limitQuerySchema, request.query, 'query parameters', request, reply);
    if (!query) {
      return reply;
    }
    const executions = await engine.listExecutions(query.limit);
    return reply.send(createSuccessResponse(executions, request.id));
  });

  app.get(`${PLANNING_PREFIX}/executions/:id`, async (request, reply) => {
    const params = parseOrReply(executionIdParamsSchema, request.params, 'execution ID', request, reply);
    if (!params) {
      return reply;
    }
    const execution = await engine.getExecution(params.id);
    return reply.send(createSuccessResponse(execution, request.id));
  });

  /**
   * POST /api/v1/planning/executions/:id/task-action - Manual task transition
   */
  app.post(`${PLANNING_PREFIX}/executions/:id/task-action`, async (request, reply) => {
    const params = parseOrReply(executionIdParamsSchema, request.params, 'execution ID', request, reply);
    if (!params) {
      return reply;
    }
    const body = parseOrReply(taskActionBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const execution = await engine.taskAction(params.id, body.taskId, body.action, body.note);
    return reply.send(createSuccessResponse(execution, request.id));
  });

  app.post(`${PLANNING_PREFIX}/executions/:id/tick`, async (request, reply) => {
    const params = parseOrReply(executionIdParamsSchema, request.params, 'execution ID', request, reply);
    if (!params) {
      return reply;
    }
    const execution = await engine.tick(params.id);
    return reply.send(createSuccessResponse(execution, request.id));
  });

  /**
   * POST /api/v1/planning/executions/:id/run - Tick until done or out of steps
   */
  app.post(`${PLANNING_PREFIX}/executions/:id/run`, async (request, reply) => {
    const params = parseOrReply(executionIdParamsSchema, request.params, 'execution ID', request, reply);
    if (!params) {
      return reply;
    }
    const body = parseOrReply(runBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const execution = await engine.run(params.id, body.maxSteps);
    return reply.send(createSuccessResponse(execution, request.id));
  });

  app.post(`${PLANNING_PREFIX}/executions/:id/cancel`, async (request, reply) => {
    const params = parseOrReply(executionIdParamsSchema, request.params, 'execution ID', request, reply);
    if (!params) {
      return reply;
    }
    const body = parseOrReply(cancelBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const execution = await engine.cancelExecution(params.id, body.reason);
    return reply.send(createSuccessResponse(execution, request.id));
  });

  /**
   * POST /api/v1/planning/execution - Store a free-form execution record
   */
  app.post(`${PLANNING_PREFIX}/execution`, async (request, reply) => {
    const body = parseOrReply(executionRecordBodySchema, request.body, 'request body', request, reply);
    if (!body) {
      return reply;
    }
    const record = await executionLog.record(body);
    return reply.status(201).send(createSuccessResponse(record, request.id));
  });

  /**
   * GET /api/v1/planning/execution - Execution log, newest first
   */
  app.get(`${PLANNING_PREFIX}/execution`, async (request, reply) => {
    const query = parseOrReply(executionLogQuerySchema, request.query, 'query parameters', request, reply);
    if (!query) {
      return reply;
    }
    const items = await executionLog.list(query);
    return reply.send(createSuccessResponse(items, request.id));
  });
}
