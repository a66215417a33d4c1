import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";
import { downstreamCallSchema } from "../../core/types/schemas.js";
import { withRequestScope } from "../http.js";

export function registerDownstreamRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.post("/v1/downstream", async (request, reply) =>
    withRequestScope(context, request, reply, async ({ credentials, abortSignal }) => {
      const payload = downstreamCallSchema.parse(request.body ?? {});
      const result = await context.downstreamApiService.request(credentials, {
        method: payload.method,
        path: payload.path,
        body: payload.body,
        abortSignal
      });
      return reply.send({
        status: result.status,
        delegated: result.delegated,
        data: result.data
      });
    })
  );
}
