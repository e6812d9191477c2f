import helmet from "helmet";
import type { RequestHandler } from "express";
import { parseCspSourceList, type AppConfig, type SecurityHeadersConfig } from "../config";

const PERMISSIONS_POLICY_VALUE = "geolocation=(), microphone=(), camera=(), payment=()";

export function resolveSecurityHeadersConfig(config: AppConfig): SecurityHeadersConfig {
  const configured = config.securityHeaders;
  const inferredProduction = (process.env.NODE_ENV ?? "").toLowerCase() === "production";

  return {
    isProduction: configured?.isProduction ?? inferredProduction,
    cspFrameAncestors: parseCspSourceList(configured?.cspFrameAncestors?.join(","), ["'none'"]),
    cspConnectSrc: parseCspSourceList(configured?.cspConnectSrc?.join(","), ["'self'"])
  };
}

/** JSON responses never load subresources, so the policy denies everything but framing and fetches. */
export function createApiSecurityHeaders(config: AppConfig): RequestHandler {
  const resolved = resolveSecurityHeadersConfig(config);
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        baseUri: ["'none'"],
        formAction: ["'none'"],
        frameAncestors: resolved.cspFrameAncestors,
        connectSrc: resolved.cspConnectSrc
      }
    },
    referrerPolicy: { policy: "no-referrer" },
    xFrameOptions: { action: "deny" },
    crossOriginOpenerPolicy: { policy: "same-origin" },
    crossOriginResourcePolicy: { policy: "same-origin" },
    crossOriginEmbedderPolicy: false,
    hsts: resolved.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false
  });

  return (req, res, next) => {
    if (!res.getHeader("Permissions-Policy")) {
      res.setHeader("Permissions-Policy", PERMISSIONS_POLICY_VALUE);
    }
    res.setHeader("Cache-Control", "no-store");
    helmetMiddleware(req, res, next);
  };
}
