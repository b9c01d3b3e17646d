import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type CreateCustomStatus,
  type UpdateCustomStatus,
  type StatusCodeParam,
  type StatusLookupQuery,
  type SetStatusActive,
} from '@tooth-ledger/shared/schemas/status.schema.js';
import {
  listActiveStatuses,
  listCustomStatuses,
  resolveStatus,
  describeStatus,
  registerCustomStatus,
  updateCustomStatus,
  setCustomStatusActive,
  type StatusServiceDeps,
} from './status.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface StatusHandlerDeps {
  serviceDeps: StatusServiceDeps;
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createStatusHandlers(deps: StatusHandlerDeps) {
  const { serviceDeps } = deps;

  async function listActiveHandler(_request: FastifyRequest, reply: FastifyReply) {
    const groups = await listActiveStatuses(serviceDeps);
    return reply.code(200).send({ data: groups });
  }

  async function listCustomHandler(_request: FastifyRequest, reply: FastifyReply) {
    const statuses = await listCustomStatuses(serviceDeps);
    return reply.code(200).send({ data: statuses });
  }

  async function resolveHandler(
    request: FastifyRequest<{ Params: StatusCodeParam; Querystring: StatusLookupQuery }>,
    reply: FastifyReply,
  ) {
    const { code } = request.params;
    const status = request.query.describe
      ? await describeStatus(serviceDeps, code)
      : await resolveStatus(serviceDeps, code);
    return reply.code(200).send({ data: status });
  }

  async function registerHandler(
    request: FastifyRequest<{ Body: CreateCustomStatus }>,
    reply: FastifyReply,
  ) {
    const body = request.body;
    const status = await registerCustomStatus(serviceDeps, {
      code: body.code,
      displayName: body.display_name,
      color: body.color,
      category: body.category,
    });
    return reply.code(201).send({ data: status });
  }

  async function updateHandler(
    request: FastifyRequest<{ Params: StatusCodeParam; Body: UpdateCustomStatus }>,
    reply: FastifyReply,
  ) {
    const body = request.body;
    const status = await updateCustomStatus(serviceDeps, request.params.code, {
      displayName: body.display_name,
      color: body.color,
      category: body.category,
    });
    return reply.code(200).send({ data: status });
  }

  async function setActiveHandler(
    request: FastifyRequest<{ Params: StatusCodeParam; Body: SetStatusActive }>,
    reply: FastifyReply,
  ) {
    const status = await setCustomStatusActive(
      serviceDeps,
      request.params.code,
      request.body.is_active,
    );
    return reply.code(200).send({ data: status });
  }

  return {
    listActiveHandler,
    listCustomHandler,
    resolveHandler,
    registerHandler,
    updateHandler,
    setActiveHandler,
  };
}
