import type { NextFunction, Request, RequestHandler, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { RateLimitedError, UnauthorizedError } from "@pdfshrink/shared/errors.js";
import { API_KEY_HEADER, type IdentityResolver, type ResolvedIdentity } from "@pdfshrink/shared/identity.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import type { RateLimiter } from "@pdfshrink/shared/rateLimiter.js";

const log = createLogger("gate");

interface RequestState {
  requestId: string;
  identity?: ResolvedIdentity;
}

const states = new WeakMap<Request, RequestState>();

/** Express 4 does not forward rejected promises to the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/** Tag every request with an id, echoed back in X-Request-Id. */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const id = uuidv4().replace(/-/g, "");
    states.set(req, { requestId: id });
    res.setHeader("X-Request-Id", id);
    next();
  };
}

export function requestIdOf(req: Request): string {
  return states.get(req)?.requestId ?? "unknown";
}

export function identityOf(req: Request): ResolvedIdentity {
  const identity = states.get(req)?.identity;
  if (!identity) {
    throw new UnauthorizedError("route reached without passing the identity gate");
  }
  return identity;
}

export function clientAddress(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Count this request against `scope`'s quota for the caller's address.
 * Sets the X-RateLimit-* headers on enforced scopes.
 */
export function rateLimit(limiter: RateLimiter, scope: string): RequestHandler {
  return asyncHandler(async (req, res, next) => {
    const decision = await limiter.allow(scope, clientAddress(req));
    if (Number.isFinite(decision.limit)) {
      res.setHeader("X-RateLimit-Limit", String(decision.limit));
      res.setHeader("X-RateLimit-Remaining", String(decision.remaining));
      res.setHeader("X-RateLimit-Reset", String(Math.ceil(decision.resetAt / 1000)));
    }
    if (!decision.allowed) {
      log.warn(`rate limit hit on ${scope} by ${clientAddress(req)}`);
      throw new RateLimitedError(decision.retryAfterSeconds);
    }
    next();
  });
}

/** Resolve X-API-Key to a principal; 401 before any handler runs otherwise. */
export function authenticate(identity: IdentityResolver): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const resolved = await identity.resolve(req.get(API_KEY_HEADER));
    const state = states.get(req);
    if (state) {
      state.identity = resolved;
    } else {
      states.set(req, { requestId: "unknown", identity: resolved });
    }
    next();
  });
}
