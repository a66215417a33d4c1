import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";
import { withRequestScope } from "../http.js";

export function registerIdentityRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.get("/v1/me", async (request, reply) =>
    withRequestScope(context, request, reply, async ({ credentials }) => {
      const subjectId = credentials.getSubjectId();
      return reply.send({
        subjectId: subjectId ?? null,
        delegated: credentials.getDelegatedCredential() !== undefined
      });
    })
  );
}
