import Fastify from "fastify";
import { createGatewayContext, type GatewayContext } from "../core/services/gateway-context.js";
import { handleError, requestIdFromHeaders } from "./http.js";
import { registerDownstreamRoutes } from "./routes/downstream.js";
import { registerIdentityRoutes } from "./routes/identity.js";
import { registerPublicRoutes } from "./routes/public.js";

export function buildServer(context: GatewayContext = createGatewayContext()) {
  const app = Fastify({
    loggerInstance: context.logger,
    bodyLimit: context.config.bodyLimitBytes,
    genReqId: (req) => requestIdFromHeaders(req.headers)
  });

  // Security response headers
  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
    // Deprecated in modern browsers; set to 0 to avoid legacy misbehavior.
    reply.header("x-xss-protection", "0");
  });

  // CORS
  const allowed = context.config.corsOrigins;
  if (allowed.length > 0) {
    const allowAll = allowed.includes("*");

    app.addHook("onRequest", async (request, reply) => {
      const origin = request.headers.origin;
      if (typeof origin === "string") {
        if (allowAll || allowed.includes(origin)) {
          reply.header("access-control-allow-origin", allowAll ? "*" : origin);
          reply.header("access-control-allow-methods", "GET, POST, OPTIONS");
          reply.header("access-control-allow-headers", "Authorization, Content-Type, X-Request-Id");
          // Browser callers need to read the step-up challenge header.
          reply.header("access-control-expose-headers", "WWW-Authenticate, X-Request-Id");
          reply.header("access-control-max-age", "86400");
          if (!allowAll) {
            reply.header("vary", "Origin");
          }
        }
      }
      // Preflights end here. Without allow headers the browser refuses a foreign origin itself.
      if (request.method === "OPTIONS") {
        return reply.status(204).send();
      }
    });
  }

  app.setErrorHandler((error, request, reply) => handleError(error, request, reply));

  registerPublicRoutes(app);
  registerIdentityRoutes(app, context);
  registerDownstreamRoutes(app, context);

  return app;
}

export type { GatewayContext };
